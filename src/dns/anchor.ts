/**
 * DNS anchor fetch and parse.
 *
 * The publisher writes one TXT record of the form
 * `TS=<iso>;SHA256=<hex>;FILE=<name>`. Key order does not matter and unknown
 * keys are ignored. A record missing keys still parses; the missing fields
 * are simply absent and downstream checks fail against them.
 */
import { DnsRecordMalformedError, DnsResolutionError, formatError } from "../poa/errors.js";
import type { AnchorFetchResult, DnsAnchor } from "../types/poa.js";
import type { TxtLookup } from "./txtLookup.js";

export type AnchorFields = Pick<DnsAnchor, "file" | "digest" | "observedAt">;

const QUOTED_SEGMENT = /"([^"]*)"/g;

/**
 * Clean a TXT value as printed by resolvers: `"A" "B"` becomes `AB`,
 * stray quotes are dropped and whitespace is trimmed.
 */
export function cleanTxtValue(raw: string): string {
  const text = raw.trim();
  if (!text) return "";
  const quoted = [...text.matchAll(QUOTED_SEGMENT)].map((match) => match[1]);
  if (quoted.length > 0) return quoted.join("").trim();
  return text.replace(/"/g, "").trim();
}

/**
 * Pick the anchor out of a TXT answer: the first record that carries a
 * `SHA256=` field, otherwise the first non-empty record.
 */
export function selectAnchorRecord(records: string[][]): string {
  const values = records.map((chunks) => cleanTxtValue(chunks.join("")));
  return values.find((value) => value.includes("SHA256=")) ?? values.find((value) => value) ?? "";
}

export function parseAnchorRecord(txt: string): AnchorFields {
  const fields: AnchorFields = {};
  for (const segment of txt.split(";")) {
    const eq = segment.indexOf("=");
    if (eq <= 0) continue;
    const key = segment.slice(0, eq).trim();
    const value = segment.slice(eq + 1).trim();
    if (!value) continue;

    switch (key) {
      case "TS":
        fields.observedAt = value;
        break;
      case "SHA256":
        fields.digest = value.toLowerCase();
        break;
      case "FILE":
        fields.file = value;
        break;
      default:
        break;
    }
  }
  return fields;
}

/** Returns the malformation, or null when `SHA256` and `FILE` are present. */
export function checkAnchorShape(anchor: DnsAnchor): DnsRecordMalformedError | null {
  const missing = [
    ...(anchor.digest ? [] : ["SHA256"]),
    ...(anchor.file ? [] : ["FILE"]),
  ];
  return missing.length > 0 ? new DnsRecordMalformedError(missing, anchor.raw) : null;
}

/**
 * Resolve and parse the anchor. Never rejects: lookup failures come back as
 * `{ ok: false }` so a DNS outage degrades the DNS checks only.
 */
export async function fetchDnsAnchor(lookup: TxtLookup, name: string): Promise<AnchorFetchResult> {
  try {
    const answer = await lookup.lookupTxt(name);
    const raw = selectAnchorRecord(answer.records);
    if (!raw) {
      return { ok: false, error: new DnsResolutionError(`empty TXT answer for ${name}`) };
    }
    return { ok: true, anchor: { ...parseAnchorRecord(raw), raw, nameserver: answer.nameserver } };
  } catch (error) {
    return {
      ok: false,
      error:
        error instanceof DnsResolutionError
          ? error
          : new DnsResolutionError(`TXT lookup for ${name} failed: ${formatError(error)}`, {
              cause: error,
            }),
    };
  }
}
