/**
 * Verdict aggregator – the single join point of a verification run.
 *
 * Canonical verdict precedence:
 *   EXPIRED   a head exists but the proof window has passed
 *   INVALID   head unreadable, DNS anchor neither current nor one behind,
 *             or the chain link is broken
 *   VALID     otherwise
 *
 * The coarse public verdict is "OK" only for VALID; EXPIRED and INVALID
 * both collapse to "FAIL".
 */
import { statusPasses } from "./status.js";
import type {
  CanonicalVerdict,
  CheckResult,
  CoarseVerdict,
  NormalizedChecks,
} from "../types/poa.js";

export interface VerdictInput {
  head: CheckResult;
  chain: CheckResult;
  matchedFileHash: CheckResult;
  matchesHead: CheckResult;
  expiry: CheckResult;
  /** Whether a head was resolved; expiry only overrides when one was */
  headPresent: boolean;
}

export interface Verdict {
  verdict: CoarseVerdict;
  canonicalVerdict: CanonicalVerdict;
  reason: string;
  message: string;
  checks: CheckResult[];
  normalizedChecks: NormalizedChecks;
}

export function normalizeChecks(input: VerdictInput): NormalizedChecks {
  return {
    head_latest_json: statusPasses(input.head.status),
    dns_matches_head: statusPasses(input.matchesHead.status),
    dns_lag_ok: statusPasses(input.matchesHead.status, { warn: true }),
    dns_matched_file_hash: statusPasses(input.matchedFileHash.status),
    chain_ok: statusPasses(input.chain.status, { unknown: true }),
    not_expired: statusPasses(input.expiry.status),
  };
}

export function canonicalVerdictOf(checks: NormalizedChecks, headPresent: boolean): CanonicalVerdict {
  if (headPresent && !checks.not_expired) return "EXPIRED";
  if (!checks.head_latest_json || !checks.dns_lag_ok || !checks.chain_ok || !checks.not_expired) {
    return "INVALID";
  }
  return "VALID";
}

const GATING_KEYS = ["head_latest_json", "dns_lag_ok", "chain_ok"] as const;

function reasonFor(canonical: CanonicalVerdict, checks: NormalizedChecks): string {
  switch (canonical) {
    case "VALID":
      return "all checks passed";
    case "EXPIRED":
      return "proof expired";
    case "INVALID":
      return `failed: ${GATING_KEYS.filter((key) => !checks[key]).join(", ")}`;
  }
}

function messageFor(canonical: CanonicalVerdict, input: VerdictInput): string {
  switch (canonical) {
    case "VALID":
      return input.matchesHead.status === "WARN"
        ? `Proof valid; ${input.matchesHead.detail}.`
        : "Proof valid; DNS anchor matches the current head and the chain link holds.";
    case "EXPIRED":
      return `Proof expired: ${input.expiry.detail}.`;
    case "INVALID": {
      const driving = [input.head, input.chain, input.matchesHead].filter(
        (check) => check.status === "FAIL"
      );
      return `Proof invalid: ${driving.map((check) => `${check.id}: ${check.detail}`).join("; ")}.`;
    }
  }
}

export function aggregateVerdict(input: VerdictInput): Verdict {
  const normalizedChecks = normalizeChecks(input);
  const canonicalVerdict = canonicalVerdictOf(normalizedChecks, input.headPresent);

  return {
    verdict: canonicalVerdict === "VALID" ? "OK" : "FAIL",
    canonicalVerdict,
    reason: reasonFor(canonicalVerdict, normalizedChecks),
    message: messageFor(canonicalVerdict, input),
    checks: [input.head, input.chain, input.matchedFileHash, input.matchesHead, input.expiry],
    normalizedChecks,
  };
}
