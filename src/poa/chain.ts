import { join } from "node:path";
import { sha256File, digestsEqual } from "./digest.js";
import { ChainLinkBrokenError, formatError, isNotFound } from "./errors.js";
import type { CheckResult, HeadPointer } from "../types/poa.js";

export interface ChainLinkOutcome {
  check: CheckResult;
  /** Set when the link is broken; the engine logs it apart from DNS noise */
  broken?: ChainLinkBrokenError;
  /** Digest of the previous snapshot's bytes, when it could be hashed */
  actualDigest?: string;
}

/**
 * Recompute the digest of the head's previous snapshot and compare it with
 * the digest the head embeds. Deleting, reordering or editing a historical
 * snapshot breaks this check on the next head that references it.
 */
export async function validateChainLink(
  exportDir: string,
  head: HeadPointer | null
): Promise<ChainLinkOutcome> {
  if (!head) {
    return {
      check: { id: "chain_link", status: "UNKNOWN", detail: "no head available to follow" },
    };
  }

  const { previous } = head;
  if (!previous) {
    return {
      check: {
        id: "chain_link",
        status: "UNKNOWN",
        detail: `head ${head.current.name} has no previous reference (chain genesis)`,
      },
    };
  }

  let actual: string;
  try {
    actual = await sha256File(join(exportDir, previous.name));
  } catch (error) {
    const broken = new ChainLinkBrokenError(previous.name, previous.digest, null);
    return {
      check: {
        id: "chain_link",
        status: "FAIL",
        detail: isNotFound(error)
          ? broken.message
          : `previous snapshot ${previous.name} unreadable: ${formatError(error)}`,
      },
      broken,
    };
  }

  if (!digestsEqual(actual, previous.digest)) {
    const broken = new ChainLinkBrokenError(previous.name, previous.digest, actual);
    return { check: { id: "chain_link", status: "FAIL", detail: broken.message }, broken, actualDigest: actual };
  }

  return {
    check: {
      id: "chain_link",
      status: "OK",
      detail: `previous snapshot ${previous.name} matches embedded digest`,
    },
    actualDigest: actual,
  };
}
