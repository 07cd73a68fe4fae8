import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileReadError } from "@harvestkit/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { directoryExists, readTextFile } from "../../fs-utils.js";

describe("readTextFile", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "harvestkit-fs-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("reads UTF-8 text", async () => {
    const filePath = join(tmpDir, "a.yml");
    await writeFile(filePath, "type: log\n", "utf-8");
    expect(await readTextFile(filePath, "prospector")).toBe("type: log\n");
  });

  it("strips a byte order mark", async () => {
    const filePath = join(tmpDir, "bom.yml");
    await writeFile(filePath, "\uFEFFtype: log\n", "utf-8");
    expect(await readTextFile(filePath, "prospector")).toBe("type: log\n");
  });

  it("rejects binary content", async () => {
    const filePath = join(tmpDir, "bin.json");
    await writeFile(filePath, Buffer.from([0x7b, 0x00, 0x7d]));
    await expect(readTextFile(filePath, "pipeline")).rejects.toThrow(
      `Error reading pipeline file ${filePath}: File appears to be binary, not text`,
    );
  });

  it("wraps read failures in FileReadError", async () => {
    const filePath = join(tmpDir, "missing.yml");
    await expect(readTextFile(filePath, "prospector")).rejects.toThrow(FileReadError);
  });
});

describe("directoryExists", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "harvestkit-fs-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("is true for a directory", async () => {
    expect(await directoryExists(tmpDir)).toBe(true);
  });

  it("is false for a file or a missing path", async () => {
    const filePath = join(tmpDir, "f");
    await writeFile(filePath, "x", "utf-8");
    expect(await directoryExists(filePath)).toBe(false);
    expect(await directoryExists(join(tmpDir, "nope"))).toBe(false);
  });
});
