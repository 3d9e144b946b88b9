/**
 * Error taxonomy for the verifier.
 *
 * None of these abort a verification run: the engine turns each into a
 * failing check. Only `ConfigError` is thrown to the caller, at startup.
 */

export type PoaErrorCode =
  | "HEAD_UNREADABLE"
  | "HEAD_FILE_MISSING"
  | "HEAD_DIGEST_MISMATCH"
  | "DNS_RESOLUTION"
  | "DNS_RECORD_MALFORMED"
  | "CHAIN_LINK_BROKEN"
  | "CONFIG";

export class PoaError extends Error {
  readonly code: PoaErrorCode;

  constructor(code: PoaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The pointer record is missing, not JSON, or does not match its schema. */
export class HeadUnreadableError extends PoaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("HEAD_UNREADABLE", message, options);
  }
}

/** The pointer record names a current snapshot that is not on disk. */
export class HeadFileMissingError extends PoaError {
  constructor(readonly file: string) {
    super("HEAD_FILE_MISSING", `head snapshot ${file} not found in export directory`);
  }
}

/** The current snapshot on disk no longer hashes to the digest the pointer claims. */
export class HeadDigestMismatchError extends PoaError {
  constructor(
    readonly file: string,
    readonly expectedDigest: string,
    readonly actualDigest: string
  ) {
    super(
      "HEAD_DIGEST_MISMATCH",
      `head snapshot ${file} digest ${actualDigest} does not match pointer ${expectedDigest.toLowerCase()}`
    );
  }
}

/** Lookup failed: timeout, NXDOMAIN, no answer. Transient. */
export class DnsResolutionError extends PoaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DNS_RESOLUTION", message, options);
  }
}

export class DnsRecordMalformedError extends PoaError {
  constructor(readonly missing: string[], readonly raw: string) {
    super("DNS_RECORD_MALFORMED", `TXT record is missing ${missing.join(", ")}: ${raw}`);
  }
}

/** A historical snapshot was deleted or rewritten. */
export class ChainLinkBrokenError extends PoaError {
  constructor(
    readonly file: string,
    readonly expectedDigest: string,
    readonly actualDigest: string | null
  ) {
    super(
      "CHAIN_LINK_BROKEN",
      actualDigest === null
        ? `previous snapshot ${file} is missing`
        : `previous snapshot ${file} digest ${actualDigest} does not match ${expectedDigest.toLowerCase()}`
    );
  }
}

export class ConfigError extends PoaError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
