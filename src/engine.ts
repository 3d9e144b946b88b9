/**
 * Verification engine – wires the full proof-of-availability check.
 *
 * Flow:
 *   resolve head ─┬─ validate chain link ─┬─ reconcile anchor → expiry → verdict
 *                 ├─ rehash head file ────┤
 *   fetch anchor ─┴────────────────────────┘
 *
 * The DNS fetch and the local file work have no data dependency on each
 * other and run concurrently. Every check is evaluated on every call; none
 * of them aborts the run.
 *
 * The engine holds no per-call state. The TXT lookup and clock are injected
 * so tests can run with in-memory DNS and simulated time.
 */
import { componentLogger, type Logger } from "../lib/logger.js";
import { fetchDnsAnchor, checkAnchorShape } from "./dns/anchor.js";
import type { TxtLookup } from "./dns/txtLookup.js";
import { validateChainLink } from "./poa/chain.js";
import type { Clock } from "./poa/clock.js";
import { HeadDigestMismatchError, HeadUnreadableError, PoaError, formatError } from "./poa/errors.js";
import { evaluateExpiry } from "./poa/expiry.js";
import { recomputeHeadDigest, resolveHead } from "./poa/head.js";
import { reconcileAnchor } from "./poa/reconcile.js";
import { aggregateVerdict } from "./poa/verdict.js";
import type { CheckResult, HeadPointer, VerificationResult } from "./types/poa.js";
import type { PoaConfig } from "./config.js";

export type EngineConfig = Pick<
  PoaConfig,
  "exportDir" | "pointerFile" | "dnsName" | "proofWindowSeconds"
>;

export interface EngineDeps {
  txtLookup: TxtLookup;
  clock: Clock;
  logger?: Logger;
}

export interface VerificationEngine {
  readonly config: Readonly<EngineConfig>;
  verify(): Promise<VerificationResult>;
}

interface HeadOutcome {
  head: HeadPointer | null;
  check: CheckResult;
}

function headFailure(error: PoaError): CheckResult {
  return { id: "head_latest_json", status: "FAIL", detail: `${error.code}: ${error.message}` };
}

async function loadHead(config: EngineConfig): Promise<HeadOutcome> {
  try {
    const head = await resolveHead(config.exportDir, config.pointerFile);
    return {
      head,
      check: {
        id: "head_latest_json",
        status: "OK",
        detail: `head ${head.current.name} (seq ${head.current.sequence})`,
      },
    };
  } catch (error) {
    const failure =
      error instanceof PoaError
        ? error
        : new HeadUnreadableError(`cannot resolve head: ${formatError(error)}`, { cause: error });
    return { head: null, check: headFailure(failure) };
  }
}

export function createVerificationEngine(config: EngineConfig, deps: EngineDeps): VerificationEngine {
  const frozen: Readonly<EngineConfig> = Object.freeze({ ...config });
  const log = componentLogger("engine", deps.logger);

  return {
    config: frozen,

    async verify(): Promise<VerificationResult> {
      const anchorPending = fetchDnsAnchor(deps.txtLookup, frozen.dnsName);
      const headOutcome = await loadHead(frozen);
      const [chain, headDigest, anchor] = await Promise.all([
        validateChainLink(frozen.exportDir, headOutcome.head),
        headOutcome.head ? recomputeHeadDigest(frozen.exportDir, headOutcome.head) : null,
        anchorPending,
      ]);
      const digestError = headDigest?.error;
      const headCheck = digestError ? headFailure(digestError) : headOutcome.check;

      if (digestError instanceof HeadDigestMismatchError) {
        log.error(
          {
            code: digestError.code,
            file: digestError.file,
            expected: digestError.expectedDigest,
            actual: digestError.actualDigest,
          },
          "head digest mismatch"
        );
      } else if (headCheck.status === "FAIL") {
        log.warn({ detail: headCheck.detail }, "head unavailable");
      }
      if (chain.broken) {
        log.error(
          {
            code: chain.broken.code,
            file: chain.broken.file,
            expected: chain.broken.expectedDigest,
            actual: chain.broken.actualDigest,
          },
          "chain link broken"
        );
      }
      if (!anchor.ok) {
        log.warn(
          { code: anchor.error.code, dnsName: frozen.dnsName, err: anchor.error.message },
          "DNS anchor unavailable"
        );
      } else {
        const malformed = checkAnchorShape(anchor.anchor);
        if (malformed) {
          log.warn(
            { code: malformed.code, missing: malformed.missing, raw: malformed.raw },
            "DNS anchor malformed"
          );
        }
      }

      const now = deps.clock.now();
      const reconciliation = reconcileAnchor(anchor, headOutcome.head, {
        current: headDigest?.actualDigest ?? null,
        previous: chain.actualDigest ?? null,
      });
      const expiry = evaluateExpiry(headOutcome.head?.current ?? null, frozen.proofWindowSeconds, now);

      const verdict = aggregateVerdict({
        head: headCheck,
        chain: chain.check,
        matchedFileHash: reconciliation.matchedFileHash,
        matchesHead: reconciliation.matchesHead,
        expiry: expiry.check,
        headPresent: headOutcome.head !== null,
      });

      log.debug(
        { verdict: verdict.canonicalVerdict, checks: verdict.normalizedChecks },
        "verification complete"
      );

      return {
        ...verdict,
        head: headOutcome.head,
        anchor,
        dnsName: frozen.dnsName,
        proofWindowSeconds: frozen.proofWindowSeconds,
        validUntil: expiry.validUntil,
        now,
      };
    },
  };
}
