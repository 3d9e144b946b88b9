import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { digestsEqual, isFile, sha256File } from "../../src/poa/digest.js";
import { createExportDir, type ExportDir } from "../helpers.js";

describe("sha256File", () => {
  let exportDir: ExportDir;

  afterEach(() => exportDir.cleanup());

  it("hashes file bytes as lowercase hex", async () => {
    exportDir = createExportDir();
    const { path } = exportDir.write("heartbeats_abc.json", "abc");

    await expect(sha256File(path)).resolves.toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  it("rejects for a missing file", async () => {
    exportDir = createExportDir();
    await expect(sha256File(join(exportDir.dir, "nope.json"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("digestsEqual", () => {
  it("compares hex case-insensitively", () => {
    expect(digestsEqual("ABCDEF", "abcdef")).toBe(true);
  });

  it("never matches an absent or empty digest", () => {
    expect(digestsEqual(undefined, undefined)).toBe(false);
    expect(digestsEqual("", "")).toBe(false);
    expect(digestsEqual("abc", undefined)).toBe(false);
  });
});

describe("isFile", () => {
  let exportDir: ExportDir;

  afterEach(() => exportDir.cleanup());

  it("distinguishes files, directories and missing paths", async () => {
    exportDir = createExportDir();
    const { path } = exportDir.write("a.json", "{}");
    mkdirSync(join(exportDir.dir, "sub"));

    expect(await isFile(path)).toBe(true);
    expect(await isFile(join(exportDir.dir, "sub"))).toBe(false);
    expect(await isFile(join(exportDir.dir, "missing.json"))).toBe(false);
  });
});
