/**
 * Anchor reconciler – compares the DNS witness with the local head.
 *
 * Outcomes, in order:
 *   dns_matched_file_hash  anchor digest equals the recomputed digest of a
 *                          known local snapshot
 *   dns_matches_head       OK on the current head, WARN one export behind
 *
 * Known snapshots are the current head and its previous reference. The hash
 * match uses the bytes on disk; the head match uses the pointer's claims,
 * with file name and digest matching together.
 */
import { checkAnchorShape } from "../dns/anchor.js";
import { digestsEqual } from "./digest.js";
import type {
  AnchorFetchResult,
  CheckResult,
  DnsAnchor,
  HeadPointer,
  SnapshotRef,
} from "../types/poa.js";

export interface Reconciliation {
  matchedFileHash: CheckResult;
  matchesHead: CheckResult;
}

/** Digests recomputed from disk; null when the file could not be hashed. */
export interface RecomputedDigests {
  current: string | null;
  previous: string | null;
}

interface LocalSnapshot {
  name: string;
  claimed: string;
  actual: string | null;
}

function shortDigest(digest: string | undefined): string {
  return digest ? digest.slice(0, 12) : "(none)";
}

function describeAnchor(anchor: DnsAnchor): string {
  return `${anchor.file ?? "(no FILE)"}/${shortDigest(anchor.digest)}`;
}

function sameSnapshot(anchor: DnsAnchor, ref: SnapshotRef): boolean {
  return anchor.file === ref.name && digestsEqual(anchor.digest, ref.digest);
}

function localSnapshots(head: HeadPointer, recomputed: RecomputedDigests): LocalSnapshot[] {
  const current = { name: head.current.name, claimed: head.current.digest, actual: recomputed.current };
  return head.previous
    ? [current, { name: head.previous.name, claimed: head.previous.digest, actual: recomputed.previous }]
    : [current];
}

function matchFileHash(anchor: DnsAnchor, head: HeadPointer, recomputed: RecomputedDigests): CheckResult {
  const locals = localSnapshots(head, recomputed);
  const byName = locals.find((local) => local.name === anchor.file);
  if (byName && digestsEqual(byName.actual, anchor.digest)) {
    return {
      id: "dns_matched_file_hash",
      status: "OK",
      detail: `DNS digest matches local ${byName.name} (matched by filename)`,
    };
  }

  const byDigest = locals.find((local) => digestsEqual(local.actual, anchor.digest));
  if (byDigest) {
    return {
      id: "dns_matched_file_hash",
      status: "OK",
      detail: `DNS digest matches local ${byDigest.name} (matched by digest)`,
    };
  }

  if (byName && digestsEqual(byName.claimed, anchor.digest)) {
    return {
      id: "dns_matched_file_hash",
      status: "FAIL",
      detail: `local ${byName.name} no longer hashes to the DNS digest (on disk ${
        byName.actual ? shortDigest(byName.actual) : "unreadable"
      })`,
    };
  }

  const malformed = checkAnchorShape(anchor);
  return {
    id: "dns_matched_file_hash",
    status: "FAIL",
    detail: malformed
      ? `${malformed.code}: ${malformed.message}`
      : `DNS anchor ${describeAnchor(anchor)} matches no known local snapshot`,
  };
}

function matchHead(anchor: DnsAnchor, head: HeadPointer): CheckResult {
  if (sameSnapshot(anchor, head.current)) {
    return {
      id: "dns_matches_head",
      status: "OK",
      detail: `DNS anchor matches head ${head.current.name}`,
    };
  }

  if (head.previous && sameSnapshot(anchor, head.previous)) {
    return {
      id: "dns_matches_head",
      status: "WARN",
      detail: `DNS anchor trails head by one export (anchor ${head.previous.name}, head ${head.current.name})`,
    };
  }

  return {
    id: "dns_matches_head",
    status: "FAIL",
    detail: `DNS anchor ${describeAnchor(anchor)} does not match head ${head.current.name}/${shortDigest(head.current.digest)}`,
  };
}

export function reconcileAnchor(
  result: AnchorFetchResult,
  head: HeadPointer | null,
  recomputed: RecomputedDigests
): Reconciliation {
  if (!result.ok) {
    const detail = `DNS anchor unavailable: ${result.error.message}`;
    return {
      matchedFileHash: { id: "dns_matched_file_hash", status: "FAIL", detail },
      matchesHead: { id: "dns_matches_head", status: "FAIL", detail },
    };
  }

  if (!head) {
    const detail = "no local head to compare the DNS anchor against";
    return {
      matchedFileHash: { id: "dns_matched_file_hash", status: "FAIL", detail },
      matchesHead: { id: "dns_matches_head", status: "FAIL", detail },
    };
  }

  return {
    matchedFileHash: matchFileHash(result.anchor, head, recomputed),
    matchesHead: matchHead(result.anchor, head),
  };
}
