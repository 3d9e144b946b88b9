#!/usr/bin/env node
/**
 * Local operator check – run on the host that holds the exports.
 *
 * Reads the DNS anchor from the authoritative nameservers, finds the export
 * it names (by FILE first, then by scanning the newest snapshots for the
 * digest), recomputes the digest and reports the skew between the file's
 * mtime and the anchor's TS.
 *
 * Usage:
 *   npm run verify:local
 *   npm run verify:local -- --export-dir /proof/exports --dns-name _poa.example.net
 *   npm run verify:local -- --json     # print the full verification response instead
 *
 * Exit codes: 0 OK, 1 WARN, 2 FAIL or error.
 */
import { readdir, stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, type PoaConfig } from "../config.js";
import { fetchDnsAnchor } from "../dns/anchor.js";
import { txtLookupFromConfig, type TxtLookup } from "../dns/txtLookup.js";
import { createVerificationEngine } from "../engine.js";
import { systemClock, type Clock } from "../poa/clock.js";
import { digestsEqual, isFile, sha256File } from "../poa/digest.js";
import { formatError, isNotFound } from "../poa/errors.js";
import { POA_BASE_PATH, buildVerifyResponse } from "../poa/response.js";
import type { DnsAnchor } from "../types/poa.js";

export const SNAPSHOT_PATTERN = /^heartbeats_.*\.json$/;
export const WARN_SKEW_SECONDS = 10 * 60;

export type LocalVerdict = "OK" | "WARN" | "FAIL";

export interface LocalMatch {
  path: string;
  how: "matched_by_filename" | "matched_by_hash_scan";
}

export interface LocalVerifyDeps {
  config: PoaConfig;
  txtLookup: TxtLookup;
  clock: Clock;
  out?: (line: string) => void;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function parseArgs(argv: string[]): { json: boolean; exportDir?: string; dnsName?: string } {
  const args = argv.slice(2);
  let json = false;
  let exportDir: string | undefined;
  let dnsName: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--json") {
      json = true;
    } else if (arg === "--export-dir" && args[i + 1]) {
      exportDir = args[++i];
    } else if (arg === "--dns-name" && args[i + 1]) {
      dnsName = args[++i];
    } else {
      throw new Error(`unknown argument: ${arg}`);
    }
  }

  return { json, exportDir, dnsName };
}

/** Newest `heartbeats_*.json` files by mtime, at most `limit`. */
export async function newestSnapshotFiles(exportDir: string, limit: number): Promise<string[]> {
  const names = (await readdir(exportDir)).filter((name) => SNAPSHOT_PATTERN.test(name));
  const entries = await Promise.all(
    names.map(async (name) => {
      const path = join(exportDir, name);
      return { path, mtimeMs: (await stat(path)).mtimeMs };
    })
  );
  return entries
    .sort((a, b) => b.mtimeMs - a.mtimeMs)
    .slice(0, limit)
    .map((entry) => entry.path);
}

export async function findLocalMatch(
  exportDir: string,
  anchor: DnsAnchor,
  lookback: number
): Promise<LocalMatch | null> {
  if (anchor.file) {
    const candidate = join(exportDir, anchor.file);
    if (basename(anchor.file) === anchor.file && (await isFile(candidate))) {
      return { path: candidate, how: "matched_by_filename" };
    }
  }

  for (const path of await newestSnapshotFiles(exportDir, lookback)) {
    try {
      if (digestsEqual(await sha256File(path), anchor.digest)) {
        return { path, how: "matched_by_hash_scan" };
      }
    } catch (error) {
      // Rotated away between listing and hashing.
      if (isNotFound(error)) continue;
      throw error;
    }
  }

  return null;
}

export function localVerdict(hashOk: boolean, skewSeconds: number): LocalVerdict {
  if (!hashOk) return "FAIL";
  return Math.abs(skewSeconds) <= WARN_SKEW_SECONDS ? "OK" : "WARN";
}

export function exitCodeFor(verdict: LocalVerdict): number {
  switch (verdict) {
    case "OK":
      return 0;
    case "WARN":
      return 1;
    case "FAIL":
      return 2;
  }
}

// ── Main ──────────────────────────────────────────────────────────────────────

export async function runLocalVerify(argv: string[], deps: LocalVerifyDeps): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const opts = parseArgs(argv);
  const config: PoaConfig = {
    ...deps.config,
    exportDir: opts.exportDir ?? deps.config.exportDir,
    dnsName: opts.dnsName ?? deps.config.dnsName,
  };

  if (opts.json) {
    const engine = createVerificationEngine(config, { txtLookup: deps.txtLookup, clock: deps.clock });
    const result = await engine.verify();
    const response = buildVerifyResponse(result, {
      service: config.serviceName,
      basePath: POA_BASE_PATH,
    });
    out(JSON.stringify(response, null, 2));
    return result.verdict === "OK" ? 0 : 2;
  }

  const fetched = await fetchDnsAnchor(deps.txtLookup, config.dnsName);
  if (!fetched.ok) {
    out("VERDICT: FAIL");
    out(`DNS ERROR   : ${fetched.error.message}`);
    return 2;
  }

  const { anchor } = fetched;
  const dnsTs = anchor.observedAt ? Date.parse(anchor.observedAt) : Number.NaN;
  if (!anchor.digest || Number.isNaN(dnsTs)) {
    out("VERDICT: FAIL");
    out(`DNS NS      : ${anchor.nameserver}`);
    out(`DNS TXT     : ${anchor.raw}`);
    out("LOCAL       : FAIL (unrecognized TXT format, need TS and SHA256)");
    return 2;
  }

  const match = await findLocalMatch(config.exportDir, anchor, config.lookbackFiles);
  if (!match) {
    out("VERDICT: FAIL");
    out(`DNS NS      : ${anchor.nameserver}`);
    out(`DNS TXT     : ${anchor.raw}`);
    out(`EXPORT_DIR  : ${config.exportDir}`);
    out(`LOCAL       : FAIL (no matching export found in last ${config.lookbackFiles} files)`);
    return 2;
  }

  const fileSha = await sha256File(match.path);
  const hashOk = digestsEqual(fileSha, anchor.digest);
  const mtime = Math.floor((await stat(match.path)).mtimeMs / 1000);
  const skew = mtime - Math.floor(dnsTs / 1000);
  const verdict = localVerdict(hashOk, skew);

  out(`VERDICT: ${verdict}`);
  out(`DNS NS      : ${anchor.nameserver}`);
  out(`DNS TXT     : ${anchor.raw}`);
  out(`EXPORT_DIR  : ${config.exportDir}`);
  out(`Matched file: ${match.path} (${match.how})`);
  out(`DNS SHA256  : ${anchor.digest}`);
  out(`File SHA256 : ${fileSha}`);
  out(`Skew seconds: ${skew} (file_mtime - dns_ts)`);
  out(`LOCAL: ${verdict}`);
  return exitCodeFor(verdict);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  const run = async (): Promise<number> => {
    const config = loadConfig();
    return runLocalVerify(process.argv, {
      config,
      txtLookup: txtLookupFromConfig(config),
      clock: systemClock,
    });
  };

  run().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`ERROR: ${formatError(error)}`);
      process.exitCode = 2;
    }
  );
}
