import { describe, it, expect } from "vitest";
import { reconcileAnchor, type RecomputedDigests } from "../../src/poa/reconcile.js";
import type { AnchorFetchResult, DnsAnchor, HeadPointer } from "../../src/types/poa.js";
import { D4, D5, dnsTimeout } from "../helpers.js";

const head: HeadPointer = {
  current: {
    name: "heartbeats_0005.json",
    digest: D5,
    timestamp: "2026-10-19T12:00:00Z",
    sequence: 5,
    modifiedAt: 1792411200,
  },
  previous: { name: "heartbeats_0004.json", digest: D4 },
};

const ON_DISK: RecomputedDigests = { current: D5, previous: D4 };

function anchored(fields: Partial<DnsAnchor>): AnchorFetchResult {
  return { ok: true, anchor: { raw: "", nameserver: "ns1.test.invalid", ...fields } };
}

describe("reconcileAnchor", () => {
  it("matches the current head", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0005.json", digest: D5 }), head, ON_DISK);

    expect(result.matchedFileHash).toEqual({
      id: "dns_matched_file_hash",
      status: "OK",
      detail: "DNS digest matches local heartbeats_0005.json (matched by filename)",
    });
    expect(result.matchesHead).toEqual({
      id: "dns_matches_head",
      status: "OK",
      detail: "DNS anchor matches head heartbeats_0005.json",
    });
  });

  it("tolerates an anchor one export behind with WARN", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0004.json", digest: D4 }), head, ON_DISK);

    expect(result.matchedFileHash.status).toBe("OK");
    expect(result.matchesHead).toEqual({
      id: "dns_matches_head",
      status: "WARN",
      detail: "DNS anchor trails head by one export (anchor heartbeats_0004.json, head heartbeats_0005.json)",
    });
  });

  it("requires file name and digest to match together", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0005.json", digest: D4 }), head, ON_DISK);

    expect(result.matchesHead.status).toBe("FAIL");
    expect(result.matchedFileHash).toEqual({
      id: "dns_matched_file_hash",
      status: "OK",
      detail: "DNS digest matches local heartbeats_0004.json (matched by digest)",
    });
  });

  it("compares digests case-insensitively", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0005.json", digest: D5.toUpperCase() }), head, ON_DISK);

    expect(result.matchesHead.status).toBe("OK");
  });

  it("fails both checks for an unknown anchor", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0009.json", digest: "99".repeat(32) }), head, ON_DISK);

    expect(result.matchedFileHash.status).toBe("FAIL");
    expect(result.matchedFileHash.detail).toBe(
      "DNS anchor heartbeats_0009.json/999999999999 matches no known local snapshot"
    );
    expect(result.matchesHead.detail).toBe(
      "DNS anchor heartbeats_0009.json/999999999999 does not match head heartbeats_0005.json/5e5e5e5e5e5e"
    );
  });

  it("names the malformation when the anchor lacks fields", () => {
    const result = reconcileAnchor(anchored({ observedAt: "2026-10-19T12:00:00Z", raw: "TS=2026-10-19T12:00:00Z" }), head, ON_DISK);

    expect(result.matchedFileHash.detail).toBe(
      "DNS_RECORD_MALFORMED: TXT record is missing SHA256, FILE: TS=2026-10-19T12:00:00Z"
    );
    expect(result.matchesHead.status).toBe("FAIL");
  });

  it("fails the DNS checks when the lookup failed", () => {
    const result = reconcileAnchor({ ok: false, error: dnsTimeout() }, head, ON_DISK);

    expect(result.matchedFileHash.status).toBe("FAIL");
    expect(result.matchesHead.status).toBe("FAIL");
    expect(result.matchesHead.detail).toMatch(/^DNS anchor unavailable: no TXT returned/);
  });

  it("fails the DNS checks without a head", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0005.json", digest: D5 }), null, ON_DISK);

    expect(result.matchesHead.status).toBe("FAIL");
  });

  it("fails the hash match when the named file was rewritten on disk", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0005.json", digest: D5 }), head, {
      current: "ff".repeat(32),
      previous: D4,
    });

    expect(result.matchedFileHash).toEqual({
      id: "dns_matched_file_hash",
      status: "FAIL",
      detail: "local heartbeats_0005.json no longer hashes to the DNS digest (on disk ffffffffffff)",
    });
  });

  it("fails the hash match when the named file could not be hashed", () => {
    const result = reconcileAnchor(anchored({ file: "heartbeats_0004.json", digest: D4 }), head, {
      current: D5,
      previous: null,
    });

    expect(result.matchedFileHash.status).toBe("FAIL");
    expect(result.matchedFileHash.detail).toBe(
      "local heartbeats_0004.json no longer hashes to the DNS digest (on disk unreadable)"
    );
    expect(result.matchesHead.status).toBe("WARN");
  });

  it("matches at genesis when there is no previous reference", () => {
    const genesis: HeadPointer = { current: head.current };

    const result = reconcileAnchor(anchored({ file: "heartbeats_0004.json", digest: D4 }), genesis, ON_DISK);

    expect(result.matchesHead.status).toBe("FAIL");
    expect(result.matchedFileHash.status).toBe("FAIL");
  });
});
