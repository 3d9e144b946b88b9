import type { CheckResult, SnapshotFile } from "../types/poa.js";

export const DEFAULT_PROOF_WINDOW_SECONDS = 300;

export interface ExpiryEvaluation {
  check: CheckResult;
  notExpired: boolean;
  /** head timestamp + proof window; null without a head */
  validUntil: Date | null;
}

/**
 * A proof is current while `now <= head.timestamp + proofWindowSeconds`.
 * Uses the caller's clock only; clock skew between exporter and verifier is
 * not corrected.
 */
export function evaluateExpiry(
  head: SnapshotFile | null,
  proofWindowSeconds: number,
  now: Date
): ExpiryEvaluation {
  const producedAt = head ? Date.parse(head.timestamp) : Number.NaN;
  if (!head || Number.isNaN(producedAt)) {
    return {
      check: { id: "not_expired", status: "FAIL", detail: "no head timestamp to evaluate" },
      notExpired: false,
      validUntil: null,
    };
  }

  const validUntil = new Date(producedAt + proofWindowSeconds * 1000);
  const notExpired = now.getTime() <= validUntil.getTime();
  return {
    check: notExpired
      ? { id: "not_expired", status: "OK", detail: `proof valid until ${validUntil.toISOString()}` }
      : {
          id: "not_expired",
          status: "FAIL",
          detail: `proof expired at ${validUntil.toISOString()} (${Math.floor(
            (now.getTime() - validUntil.getTime()) / 1000
          )}s ago)`,
        },
    notExpired,
    validUntil,
  };
}
