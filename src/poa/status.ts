import type { CheckStatus } from "../types/poa.js";

export interface PassPolicy {
  /** Count WARN as passing (lag tolerance) */
  warn?: boolean;
  /** Count UNKNOWN as passing (no claim to check yet) */
  unknown?: boolean;
}

function assertNever(value: never): never {
  throw new Error(`unhandled check status: ${String(value)}`);
}

export function statusPasses(status: CheckStatus, policy: PassPolicy = {}): boolean {
  switch (status) {
    case "OK":
      return true;
    case "WARN":
      return policy.warn ?? false;
    case "UNKNOWN":
      return policy.unknown ?? false;
    case "FAIL":
      return false;
    default:
      return assertNever(status);
  }
}
