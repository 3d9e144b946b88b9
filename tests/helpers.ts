/**
 * Test fixtures: temporary export directories and an in-memory TXT lookup.
 */
import { mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { sha256Hex } from "../src/poa/digest.js";
import { DnsResolutionError } from "../src/poa/errors.js";
import type { TxtAnswer, TxtLookup } from "../src/dns/txtLookup.js";
import type { VerificationResult } from "../src/types/poa.js";

export interface WrittenSnapshot {
  name: string;
  digest: string;
  path: string;
}

export interface ExportDir {
  dir: string;
  write(name: string, body: string, mtimeSeconds?: number): WrittenSnapshot;
  writePointer(record: unknown): void;
  cleanup(): void;
}

export function createExportDir(): ExportDir {
  const dir = mkdtempSync(join(tmpdir(), "poa-test-"));
  return {
    dir,
    write(name, body, mtimeSeconds) {
      const path = join(dir, name);
      writeFileSync(path, body, "utf8");
      if (mtimeSeconds !== undefined) utimesSync(path, mtimeSeconds, mtimeSeconds);
      return { name, digest: sha256Hex(body), path };
    },
    writePointer(record) {
      writeFileSync(
        join(dir, "latest.json"),
        typeof record === "string" ? record : JSON.stringify(record),
        "utf8"
      );
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function heartbeatBody(sequence: number): string {
  return `${JSON.stringify({ seq: sequence, checks: [{ target: "web", up: true }] })}\n`;
}

/** Resolves every name to the given TXT chunks, or fails like a timeout. */
export function stubTxtLookup(records: string[][] | Error, nameserver = "ns1.test.invalid"): TxtLookup & {
  calls: string[];
} {
  const calls: string[] = [];
  return {
    calls,
    async lookupTxt(name: string): Promise<TxtAnswer> {
      calls.push(name);
      if (records instanceof Error) throw records;
      return { records, nameserver };
    },
  };
}

export function anchorTxt(fields: { ts?: string; sha256?: string; file?: string }): string[][] {
  const parts = [
    ...(fields.ts ? [`TS=${fields.ts}`] : []),
    ...(fields.sha256 ? [`SHA256=${fields.sha256}`] : []),
    ...(fields.file ? [`FILE=${fields.file}`] : []),
  ];
  return [[parts.join(";")]];
}

export const dnsTimeout = (): DnsResolutionError =>
  new DnsResolutionError(
    "no TXT returned for _poa.test.invalid via authoritative NS (zone=test.invalid): queryTxt ETIMEOUT"
  );

export const D4 = "4d".repeat(32);
export const D5 = "5e".repeat(32);

/** A VALID result for head heartbeats_0005.json anchored at the same file. */
export function sampleResult(overrides: Partial<VerificationResult> = {}): VerificationResult {
  return {
    verdict: "OK",
    canonicalVerdict: "VALID",
    reason: "all checks passed",
    message: "Proof valid; DNS anchor matches the current head and the chain link holds.",
    checks: [
      { id: "head_latest_json", status: "OK", detail: "head heartbeats_0005.json (seq 5)" },
      { id: "chain_link", status: "OK", detail: "previous snapshot heartbeats_0004.json matches embedded digest" },
      { id: "dns_matched_file_hash", status: "OK", detail: "DNS digest matches local heartbeats_0005.json (matched by filename)" },
      { id: "dns_matches_head", status: "OK", detail: "DNS anchor matches head heartbeats_0005.json" },
      { id: "not_expired", status: "OK", detail: "proof valid until 2026-10-19T12:05:00.000Z" },
    ],
    normalizedChecks: {
      head_latest_json: true,
      dns_matches_head: true,
      dns_lag_ok: true,
      dns_matched_file_hash: true,
      chain_ok: true,
      not_expired: true,
    },
    head: {
      current: {
        name: "heartbeats_0005.json",
        digest: D5,
        timestamp: "2026-10-19T12:00:00Z",
        sequence: 5,
        modifiedAt: 1792411200,
      },
      previous: { name: "heartbeats_0004.json", digest: D4 },
    },
    anchor: {
      ok: true,
      anchor: {
        file: "heartbeats_0005.json",
        digest: D5,
        observedAt: "2026-10-19T12:00:00Z",
        raw: `TS=2026-10-19T12:00:00Z;SHA256=${D5};FILE=heartbeats_0005.json`,
        nameserver: "ns1.test.invalid",
      },
    },
    dnsName: "_poa.test.invalid",
    proofWindowSeconds: 300,
    validUntil: new Date("2026-10-19T12:05:00Z"),
    now: new Date("2026-10-19T12:02:00Z"),
    ...overrides,
  };
}
