import { describe, it, expect } from "vitest";
import {
  checkAnchorShape,
  cleanTxtValue,
  fetchDnsAnchor,
  parseAnchorRecord,
  selectAnchorRecord,
} from "../../src/dns/anchor.js";
import { parseNameserverList } from "../../src/dns/txtLookup.js";
import { DnsResolutionError } from "../../src/poa/errors.js";
import { dnsTimeout, stubTxtLookup } from "../helpers.js";

describe("cleanTxtValue", () => {
  it("joins quoted character-strings", () => {
    expect(cleanTxtValue('"TS=2026-10-19T12:00:00Z;" "SHA256=abc"')).toBe("TS=2026-10-19T12:00:00Z;SHA256=abc");
  });

  it("trims unquoted values and drops stray quotes", () => {
    expect(cleanTxtValue("  TS=a;FILE=b  ")).toBe("TS=a;FILE=b");
    expect(cleanTxtValue('"abc')).toBe("abc");
  });

  it("returns an empty string for blank input", () => {
    expect(cleanTxtValue("   ")).toBe("");
  });
});

describe("selectAnchorRecord", () => {
  it("prefers the record carrying SHA256", () => {
    expect(selectAnchorRecord([["v=spf1 -all"], ["TS=1;", "SHA256=ab"]])).toBe("TS=1;SHA256=ab");
  });

  it("falls back to the first non-empty record", () => {
    expect(selectAnchorRecord([[""], ["hello"], ["world"]])).toBe("hello");
  });

  it("returns an empty string for an empty answer", () => {
    expect(selectAnchorRecord([])).toBe("");
  });
});

describe("parseAnchorRecord", () => {
  it("parses TS, SHA256 and FILE and ignores unknown keys", () => {
    expect(
      parseAnchorRecord("TS=2026-10-19T12:00:00Z;SHA256=ABCDEF;FILE=heartbeats_0005.json;VER=2")
    ).toEqual({
      observedAt: "2026-10-19T12:00:00Z",
      digest: "abcdef",
      file: "heartbeats_0005.json",
    });
  });

  it("does not depend on key order", () => {
    expect(parseAnchorRecord("FILE=x.json; TS=t ")).toEqual({ file: "x.json", observedAt: "t" });
  });

  it("treats keys case-sensitively", () => {
    expect(parseAnchorRecord("sha256=abc;file=x.json")).toEqual({});
  });

  it("leaves missing or empty fields absent instead of throwing", () => {
    expect(parseAnchorRecord("garbage;SHA256=;=value")).toEqual({});
  });

  it("keeps '=' inside values", () => {
    expect(parseAnchorRecord("FILE=a=b.json")).toEqual({ file: "a=b.json" });
  });
});

describe("checkAnchorShape", () => {
  it("reports the missing keys", () => {
    const malformed = checkAnchorShape({ digest: "ab", raw: "TS=x;SHA256=ab", nameserver: "ns1" });

    expect(malformed?.code).toBe("DNS_RECORD_MALFORMED");
    expect(malformed?.missing).toEqual(["FILE"]);
    expect(malformed?.message).toBe("TXT record is missing FILE: TS=x;SHA256=ab");
  });

  it("accepts a complete anchor", () => {
    expect(checkAnchorShape({ digest: "ab", file: "a.json", raw: "", nameserver: "ns1" })).toBeNull();
  });
});

describe("fetchDnsAnchor", () => {
  it("returns the parsed anchor with the answering nameserver", async () => {
    const lookup = stubTxtLookup([['"TS=2026-10-19T12:00:00Z;SHA256=AB;FILE=heartbeats_0005.json"']]);

    const result = await fetchDnsAnchor(lookup, "_poa.test.invalid");

    expect(lookup.calls).toEqual(["_poa.test.invalid"]);
    expect(result).toEqual({
      ok: true,
      anchor: {
        observedAt: "2026-10-19T12:00:00Z",
        digest: "ab",
        file: "heartbeats_0005.json",
        raw: "TS=2026-10-19T12:00:00Z;SHA256=AB;FILE=heartbeats_0005.json",
        nameserver: "ns1.test.invalid",
      },
    });
  });

  it("degrades a lookup timeout to a failed result", async () => {
    const timeout = dnsTimeout();

    const result = await fetchDnsAnchor(stubTxtLookup(timeout), "_poa.test.invalid");

    expect(result).toEqual({ ok: false, error: timeout });
  });

  it("wraps unexpected errors as DnsResolutionError", async () => {
    const result = await fetchDnsAnchor(stubTxtLookup(new Error("boom")), "_poa.test.invalid");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DnsResolutionError);
    expect(result.error.message).toBe("TXT lookup for _poa.test.invalid failed: boom");
  });

  it("fails on an answer with no usable text", async () => {
    const result = await fetchDnsAnchor(stubTxtLookup([[""]]), "_poa.test.invalid");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("empty TXT answer for _poa.test.invalid");
  });
});

describe("parseNameserverList", () => {
  it("splits, trims and strips trailing dots", () => {
    expect(parseNameserverList("ns1.example.net., 192.0.2.53,, ")).toEqual(["ns1.example.net", "192.0.2.53"]);
  });

  it("returns an empty list for an empty override", () => {
    expect(parseNameserverList("")).toEqual([]);
  });
});
