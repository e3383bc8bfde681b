/**
 * Tandem Engine — Verifier Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { checkFilesPresent, computeBufferHash, computeFileHash, sameFileContent } from "../src/verifier";
import { makeTempDir, removeDir } from "./fakes";

describe("verifier", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("verifier");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("hashes files the same way as buffers", async () => {
    const file = path.join(root, "a.txt");
    fs.writeFileSync(file, "hello");
    expect(await computeFileHash(file)).toBe(computeBufferHash("hello"));
    expect(computeBufferHash("hello")).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  it("fails to hash a missing file", async () => {
    await expect(computeFileHash(path.join(root, "nope"))).rejects.toThrow("Failed to read file for hashing");
  });

  it("compares file contents", async () => {
    const a = path.join(root, "a");
    const b = path.join(root, "b");
    const c = path.join(root, "c");
    fs.writeFileSync(a, "same");
    fs.writeFileSync(b, "same");
    fs.writeFileSync(c, "diff");

    expect(await sameFileContent(a, b)).toBe(true);
    expect(await sameFileContent(a, c)).toBe(false);
    expect(await sameFileContent(a, path.join(root, "missing"))).toBe(false);
  });

  it("splits present and missing files", () => {
    fs.writeFileSync(path.join(root, "DLLInjector.exe"), "");
    expect(checkFilesPresent(root, ["DLLInjector.exe", "DLLInjector.ini"])).toEqual({
      present: ["DLLInjector.exe"],
      missing: ["DLLInjector.ini"],
    });
  });
});
