/**
 * Proof of Availability data model.
 *
 * Snapshots are produced by the exporter (`heartbeats_*.json`) and the
 * pointer record (`latest.json`) names the current head. Everything here is
 * read-only to the verifier and recomputed on every request.
 */
import type { DnsResolutionError } from "../poa/errors.js";

// ── Snapshots ────────────────────────────────────────────────────────────────

export interface SnapshotRef {
  /** On-disk file name inside the export directory */
  name: string;
  /** SHA-256 of the file bytes (hex, compared case-insensitively) */
  digest: string;
}

export interface SnapshotFile extends SnapshotRef {
  /** ISO-8601 UTC time the exporter produced the snapshot */
  timestamp: string;
  /** Monotonically increasing chain sequence number */
  sequence: number;
  /** File modification time in epoch seconds; informational only */
  modifiedAt: number;
}

export interface HeadPointer {
  current: SnapshotFile;
  /** Absent only at chain genesis */
  previous?: SnapshotRef;
}

// ── DNS anchor ───────────────────────────────────────────────────────────────

export interface DnsAnchor {
  /** `FILE=` value */
  file?: string;
  /** `SHA256=` value, lowercased */
  digest?: string;
  /** `TS=` value, untyped */
  observedAt?: string;
  /** Cleaned TXT body the fields were parsed from */
  raw: string;
  /** Nameserver that answered, or `SYSTEM_RESOLVER` */
  nameserver: string;
}

export type AnchorFetchResult =
  | { ok: true; anchor: DnsAnchor }
  | { ok: false; error: DnsResolutionError };

// ── Checks ───────────────────────────────────────────────────────────────────

export type CheckStatus = "OK" | "WARN" | "FAIL" | "UNKNOWN";

/** Stable identifiers; never renamed, only appended to. */
export type CheckId =
  | "head_latest_json"
  | "chain_link"
  | "dns_matched_file_hash"
  | "dns_matches_head"
  | "not_expired";

export interface CheckResult {
  id: CheckId;
  status: CheckStatus;
  /** Human-readable; not machine-parsed */
  detail: string;
}

/** The integration surface. Keys are a compatibility contract. */
export interface NormalizedChecks {
  head_latest_json: boolean;
  dns_matches_head: boolean;
  dns_lag_ok: boolean;
  dns_matched_file_hash: boolean;
  chain_ok: boolean;
  not_expired: boolean;
}

export type CanonicalVerdict = "VALID" | "INVALID" | "EXPIRED";
export type CoarseVerdict = "OK" | "FAIL";

// ── Result ───────────────────────────────────────────────────────────────────

export interface VerificationResult {
  verdict: CoarseVerdict;
  canonicalVerdict: CanonicalVerdict;
  /** Short phrase naming what drove the canonical verdict */
  reason: string;
  /** Human summary */
  message: string;
  checks: CheckResult[];
  normalizedChecks: NormalizedChecks;
  head: HeadPointer | null;
  anchor: AnchorFetchResult;
  dnsName: string;
  proofWindowSeconds: number;
  /** `null` when no head could be read */
  validUntil: Date | null;
  now: Date;
}
