/**
 * Verifier configuration.
 *
 * Built once from the environment (plus the optional `poa.env` file the
 * exporter and publisher share) and passed explicitly into the engine,
 * server and CLIs. Process environment wins over the env file.
 *
 * Environment variables:
 *   POA_ENV_FILE                   env file to merge (default /opt/uptimeproof/infra/poa.env)
 *   POA_EXPORT_DIR                 snapshot directory (default /proof/exports)
 *   POA_POINTER_FILE               pointer record name (default latest.json)
 *   DNS_NAME                       anchor TXT name (default _poa.uptimeproof.io)
 *   DNS_ZONE                       zone whose NS set is queried (default uptimeproof.io)
 *   POA_DNS_NS_OVERRIDE            "ns1,ns2" – skip the NS lookup
 *   POA_DNS_ALLOW_SYSTEM_RESOLVER  "1" to fall back to the system resolver (discouraged)
 *   POA_DNS_TIMEOUT_MS             per-query timeout (default 2000)
 *   PROOF_WINDOW_SECONDS           proof validity after the head timestamp (default 300)
 *   POA_LOOKBACK_FILES             snapshots scanned by the local CLI (default 300)
 *   POA_SERVICE_NAME               `service` field of the verify response
 *   POA_HOST / PORT                HTTP bind address
 *   RATE_LIMIT_WINDOW_MS / RATE_LIMIT_MAX
 *   CORS_ORIGIN                    Access-Control-Allow-Origin (default *)
 */
import { existsSync, readFileSync } from "node:fs";
import { parse as parseEnvFile } from "dotenv";
import { z } from "zod";
import { parseNameserverList } from "./dns/txtLookup.js";
import { ConfigError } from "./poa/errors.js";
import { DEFAULT_POINTER_FILE } from "./poa/head.js";
import { DEFAULT_PROOF_WINDOW_SECONDS } from "./poa/expiry.js";

export const DEFAULT_ENV_FILE = "/opt/uptimeproof/infra/poa.env";
export const DEFAULT_EXPORT_DIR = "/proof/exports";
export const DEFAULT_DNS_NAME = "_poa.uptimeproof.io";
export const DEFAULT_DNS_ZONE = "uptimeproof.io";

export interface PoaConfig {
  exportDir: string;
  pointerFile: string;
  dnsName: string;
  dnsZone: string;
  nameserverOverride: string[];
  allowSystemResolver: boolean;
  dnsTimeoutMs: number;
  proofWindowSeconds: number;
  lookbackFiles: number;
  serviceName: string;
  host: string;
  port: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  corsOrigin: string;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  POA_EXPORT_DIR: z.string().min(1).default(DEFAULT_EXPORT_DIR),
  POA_POINTER_FILE: z.string().min(1).default(DEFAULT_POINTER_FILE),
  DNS_NAME: z.string().min(1).default(DEFAULT_DNS_NAME),
  DNS_ZONE: z.string().min(1).default(DEFAULT_DNS_ZONE),
  POA_DNS_NS_OVERRIDE: z.string().default(""),
  POA_DNS_ALLOW_SYSTEM_RESOLVER: z.enum(["0", "1"]).default("0"),
  POA_DNS_TIMEOUT_MS: positiveInt(2000),
  PROOF_WINDOW_SECONDS: positiveInt(DEFAULT_PROOF_WINDOW_SECONDS),
  POA_LOOKBACK_FILES: positiveInt(300),
  POA_SERVICE_NAME: z.string().min(1).default("uptimeproof"),
  POA_HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
  RATE_LIMIT_MAX: positiveInt(120),
  CORS_ORIGIN: z.string().min(1).default("*"),
});

type Env = Record<string, string | undefined>;

/** Read `KEY=VALUE` lines from an env file; a missing file yields `{}`. */
export function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  return parseEnvFile(readFileSync(path, "utf8"));
}

function withoutBlanks(env: Env): Env {
  return Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
}

export function loadConfig(env: Env = process.env): PoaConfig {
  const fileEnv = readEnvFile(env.POA_ENV_FILE ?? DEFAULT_ENV_FILE);
  const parsed = envSchema.safeParse({ ...withoutBlanks(fileEnv), ...withoutBlanks(env) });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    exportDir: values.POA_EXPORT_DIR.replace(/\/+$/, "") || "/",
    pointerFile: values.POA_POINTER_FILE,
    dnsName: values.DNS_NAME,
    dnsZone: values.DNS_ZONE,
    nameserverOverride: parseNameserverList(values.POA_DNS_NS_OVERRIDE),
    allowSystemResolver: values.POA_DNS_ALLOW_SYSTEM_RESOLVER === "1",
    dnsTimeoutMs: values.POA_DNS_TIMEOUT_MS,
    proofWindowSeconds: values.PROOF_WINDOW_SECONDS,
    lookbackFiles: values.POA_LOOKBACK_FILES,
    serviceName: values.POA_SERVICE_NAME,
    host: values.POA_HOST,
    port: values.PORT,
    rateLimitWindowMs: values.RATE_LIMIT_WINDOW_MS,
    rateLimitMax: values.RATE_LIMIT_MAX,
    corsOrigin: values.CORS_ORIGIN,
  };
}
