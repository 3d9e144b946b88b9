/**
 * Head resolver.
 *
 * Reads the pointer record (`latest.json`) written by the exporter and
 * returns the current head plus the previous snapshot reference it embeds.
 * The record is re-read on every call; nothing is cached between requests.
 *
 * Accepted record shape:
 *
 *   {
 *     "file": "heartbeats_20261019T120000Z.json",
 *     "sha256": "<64 hex>",
 *     "ts": "2026-10-19T12:00:00Z",
 *     "seq": 5,
 *     "mtime": 1792411200,                                  // optional
 *     "prev": { "file": "heartbeats_...json", "sha256": "<64 hex>" }
 *   }
 *
 * The previous reference may also be given flat as `prev_file` and
 * `prev_sha256`. Either form may be omitted or null at chain genesis.
 */
import { readFile, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import { digestsEqual, sha256File } from "./digest.js";
import {
  HeadDigestMismatchError,
  HeadFileMissingError,
  HeadUnreadableError,
  PoaError,
  formatError,
  isNotFound,
} from "./errors.js";
import type { HeadPointer, SnapshotRef } from "../types/poa.js";

export const DEFAULT_POINTER_FILE = "latest.json";

const snapshotName = z
  .string()
  .min(1)
  .refine((name) => basename(name) === name && name !== "." && name !== "..", {
    message: "must be a plain file name",
  });

const digestHex = z.string().regex(/^[0-9a-fA-F]{64}$/, "must be 64 hex characters");

const pointerSchema = z.object({
  file: snapshotName,
  sha256: digestHex,
  ts: z.string().refine((ts) => !Number.isNaN(Date.parse(ts)), {
    message: "must be an ISO-8601 timestamp",
  }),
  seq: z.number().int().nonnegative(),
  mtime: z.number().nonnegative().optional(),
  prev: z.object({ file: snapshotName, sha256: digestHex }).nullish(),
  prev_file: snapshotName.nullish(),
  prev_sha256: digestHex.nullish(),
});

export type PointerRecord = z.infer<typeof pointerSchema>;

/**
 * Parse a pointer record body. Throws `HeadUnreadableError` for anything
 * that is not a well-formed record.
 */
export function parsePointerRecord(body: string): PointerRecord {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new HeadUnreadableError(`pointer record is not valid JSON: ${formatError(error)}`, {
      cause: error,
    });
  }

  const parsed = pointerSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new HeadUnreadableError(`pointer record rejected: ${issues}`);
  }
  return parsed.data;
}

function previousRef(record: PointerRecord): SnapshotRef | undefined {
  if (record.prev) {
    return { name: record.prev.file, digest: record.prev.sha256 };
  }

  const file = record.prev_file ?? undefined;
  const sha256 = record.prev_sha256 ?? undefined;
  if (file === undefined && sha256 === undefined) return undefined;
  if (file === undefined || sha256 === undefined) {
    throw new HeadUnreadableError("prev_file and prev_sha256 must be given together");
  }
  return { name: file, digest: sha256 };
}

/**
 * Resolve the current head from `<exportDir>/<pointerFile>`.
 *
 * Throws `HeadUnreadableError` when the record cannot be read or parsed and
 * `HeadFileMissingError` when the snapshot it names is not on disk.
 */
export async function resolveHead(
  exportDir: string,
  pointerFile: string = DEFAULT_POINTER_FILE
): Promise<HeadPointer> {
  const pointerPath = join(exportDir, pointerFile);

  let body: string;
  try {
    body = await readFile(pointerPath, "utf8");
  } catch (error) {
    throw new HeadUnreadableError(`cannot read ${pointerFile}: ${formatError(error)}`, {
      cause: error,
    });
  }

  const record = parsePointerRecord(body);
  const previous = previousRef(record);

  let mtimeSeconds: number;
  try {
    const st = await stat(join(exportDir, record.file));
    if (!st.isFile()) throw new HeadFileMissingError(record.file);
    mtimeSeconds = Math.floor(st.mtimeMs / 1000);
  } catch (error) {
    if (isNotFound(error)) throw new HeadFileMissingError(record.file);
    throw error;
  }

  return {
    current: {
      name: record.file,
      digest: record.sha256.toLowerCase(),
      timestamp: record.ts,
      sequence: record.seq,
      modifiedAt: record.mtime ?? mtimeSeconds,
    },
    ...(previous ? { previous: { name: previous.name, digest: previous.digest.toLowerCase() } } : {}),
  };
}

export interface HeadDigestOutcome {
  /** Digest of the bytes on disk; null when the file could not be hashed */
  actualDigest: string | null;
  error?: PoaError;
}

/**
 * Hash the current snapshot and compare it with the digest the pointer
 * claims. A snapshot rewritten after publication fails here.
 */
export async function recomputeHeadDigest(exportDir: string, head: HeadPointer): Promise<HeadDigestOutcome> {
  const { name, digest } = head.current;
  let actualDigest: string;
  try {
    actualDigest = await sha256File(join(exportDir, name));
  } catch (error) {
    return {
      actualDigest: null,
      error: isNotFound(error)
        ? new HeadFileMissingError(name)
        : new HeadUnreadableError(`cannot hash head snapshot ${name}: ${formatError(error)}`, {
            cause: error,
          }),
    };
  }

  if (!digestsEqual(actualDigest, digest)) {
    return { actualDigest, error: new HeadDigestMismatchError(name, digest, actualDigest) };
  }
  return { actualDigest };
}
