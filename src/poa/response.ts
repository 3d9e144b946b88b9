/**
 * Public JSON contract for `/poa/v1/verify` and its condensed projection.
 *
 * Fields may be added; none are removed or renamed while the schema id
 * stays `uptimeproof:poa-verify:v1`.
 */
import type {
  CanonicalVerdict,
  CheckResult,
  CoarseVerdict,
  NormalizedChecks,
  VerificationResult,
} from "../types/poa.js";

export const POA_VERIFY_SCHEMA = "uptimeproof:poa-verify:v1";
export const POA_BASE_PATH = "/poa/v1";

export interface ResponseContext {
  service: string;
  /** Path prefix the routes are mounted under, e.g. `/poa/v1` */
  basePath: string;
}

export interface PoaLinks {
  verify: string;
  status: string;
  health: string;
}

export interface PoaVerifyResponse {
  schema: typeof POA_VERIFY_SCHEMA;
  ts: string;
  verdict: CoarseVerdict;
  message: string;
  service: string;
  links: PoaLinks;
  head: { file: string; sha256: string; ts: string; sequence: number; mtime: number } | null;
  dns_anchor: {
    name: string;
    nameserver: string | null;
    raw: string | null;
    ts: string | null;
    sha256: string | null;
    file: string | null;
    error: string | null;
  };
  chain: { prev_file: string | null; prev_sha256: string | null; status: CheckResult["status"] };
  checks: CheckResult[];
  now_utc: string;
  verification: {
    verdict: CanonicalVerdict;
    reason: string;
    checks: NormalizedChecks;
  };
  proof: {
    ts: string | null;
    head: { file: string | null; sha256: string | null };
    proof_window_seconds: number;
    valid_until_utc: string | null;
  };
  anchor: { dns: { file: string | null; sha256: string | null } };
}

export interface PoaStatusSummary {
  ok: boolean;
  verdict: CoarseVerdict;
  canonical: CanonicalVerdict;
  reason: string;
  head_file: string | null;
  valid_until_utc: string | null;
  now_utc: string;
}

export function buildLinks(basePath: string): PoaLinks {
  const base = basePath.replace(/\/+$/, "");
  return { verify: `${base}/verify`, status: `${base}/status`, health: `${base}/health` };
}

export function buildVerifyResponse(result: VerificationResult, ctx: ResponseContext): PoaVerifyResponse {
  const current = result.head?.current ?? null;
  const previous = result.head?.previous ?? null;
  const anchor = result.anchor.ok ? result.anchor.anchor : null;
  const chainCheck = result.checks.find((check) => check.id === "chain_link");
  const nowIso = result.now.toISOString();

  return {
    schema: POA_VERIFY_SCHEMA,
    ts: nowIso,
    verdict: result.verdict,
    message: result.message,
    service: ctx.service,
    links: buildLinks(ctx.basePath),
    head: current
      ? {
          file: current.name,
          sha256: current.digest,
          ts: current.timestamp,
          sequence: current.sequence,
          mtime: current.modifiedAt,
        }
      : null,
    dns_anchor: {
      name: result.dnsName,
      nameserver: anchor?.nameserver ?? null,
      raw: anchor?.raw ?? null,
      ts: anchor?.observedAt ?? null,
      sha256: anchor?.digest ?? null,
      file: anchor?.file ?? null,
      error: result.anchor.ok ? null : result.anchor.error.message,
    },
    chain: {
      prev_file: previous?.name ?? null,
      prev_sha256: previous?.digest ?? null,
      status: chainCheck?.status ?? "UNKNOWN",
    },
    checks: result.checks,
    now_utc: nowIso,
    verification: {
      verdict: result.canonicalVerdict,
      reason: result.reason,
      checks: result.normalizedChecks,
    },
    proof: {
      ts: current?.timestamp ?? null,
      head: { file: current?.name ?? null, sha256: current?.digest ?? null },
      proof_window_seconds: result.proofWindowSeconds,
      valid_until_utc: result.validUntil?.toISOString() ?? null,
    },
    anchor: { dns: { file: anchor?.file ?? null, sha256: anchor?.digest ?? null } },
  };
}

export function buildStatusSummary(result: VerificationResult): PoaStatusSummary {
  return {
    ok: result.verdict === "OK",
    verdict: result.verdict,
    canonical: result.canonicalVerdict,
    reason: result.reason,
    head_file: result.head?.current.name ?? null,
    valid_until_utc: result.validUntil?.toISOString() ?? null,
    now_utc: result.now.toISOString(),
  };
}
