#!/usr/bin/env node
/**
 * Remote client check – poll a public verify endpoint and print UP or DOWN.
 *
 * Usage:
 *   npm run verify:client
 *   npm run verify:client -- https://status.example.net/poa/v1/verify
 *
 * UP requires all of: verdict "OK", verification.verdict "VALID",
 * dns_lag_ok and not_expired. Anything else is DOWN.
 *
 * Exit codes: 0 UP, 1 DOWN, 2 transport or parse error.
 */
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { formatError } from "../poa/errors.js";

export const DEFAULT_VERIFY_URL = "https://uptimeproof.io/poa/v1/verify";
export const CLIENT_TIMEOUT_MS = 10_000;

// Missing or mistyped fields read as their empty defaults, never as errors.
const lenientString = z.string().catch("");
const lenientFlag = z.boolean().catch(false);

const NO_CHECKS = { dns_lag_ok: false, not_expired: false };
const NO_VERIFICATION = { verdict: "", checks: NO_CHECKS };

const verifyBodySchema = z
  .object({
    verdict: lenientString,
    message: lenientString,
    verification: z
      .object({
        verdict: lenientString,
        checks: z.object({ dns_lag_ok: lenientFlag, not_expired: lenientFlag }).catch(NO_CHECKS),
      })
      .catch(NO_VERIFICATION),
  })
  .catch({ verdict: "", message: "", verification: NO_VERIFICATION });

export interface ClientVerdict {
  up: boolean;
  line: string;
}

export function classifyVerifyBody(body: unknown): ClientVerdict {
  const fields = verifyBodySchema.parse(body);
  const { verdict, message } = fields;
  const canonical = fields.verification.verdict;
  const { dns_lag_ok: dnsLagOk, not_expired: notExpired } = fields.verification.checks;

  if (verdict === "OK" && canonical === "VALID" && dnsLagOk && notExpired) {
    return { up: true, line: `UP - ${message}` };
  }
  return {
    up: false,
    line: `DOWN - verdict=${verdict} verification=${canonical} dns_lag_ok=${dnsLagOk} not_expired=${notExpired} - ${message}`,
  };
}

export interface ClientDeps {
  fetch?: typeof fetch;
  out?: (line: string) => void;
  err?: (line: string) => void;
  timeoutMs?: number;
}

export async function runClient(argv: string[], deps: ClientDeps = {}): Promise<number> {
  const doFetch = deps.fetch ?? fetch;
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const url = argv[2] ?? DEFAULT_VERIFY_URL;

  let body: unknown;
  try {
    const res = await doFetch(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(deps.timeoutMs ?? CLIENT_TIMEOUT_MS),
    });
    if (!res.ok) {
      err(`ERROR: ${url} returned HTTP ${res.status}`);
      return 2;
    }
    body = await res.json();
  } catch (error) {
    err(`ERROR: ${formatError(error)}`);
    return 2;
  }

  const result = classifyVerifyBody(body);
  out(result.line);
  return result.up ? 0 : 1;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  runClient(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`ERROR: ${formatError(error)}`);
      process.exitCode = 2;
    }
  );
}
