/**
 * Tandem Engine — Filesystem Mutation Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  MutationContext,
  copyFileIdempotent,
  ensureDirectory,
  nextBackupPath,
  writeFileIdempotent,
} from "../src/fs-ops";
import { ResourceLedger } from "../src/ledger";
import { classifyFsError, EXIT_CODES, exitCodeForCategory, SetupError } from "../src/errors";
import { makeTempDir, removeDir, silentLogger } from "./fakes";

describe("idempotent mutations", () => {
  let root: string;
  let ledger: ResourceLedger;
  let ctx: MutationContext;

  beforeEach(() => {
    root = makeTempDir("fsops");
    ledger = new ResourceLedger({ logger: silentLogger });
    ctx = { ledger, phase: "test", logger: silentLogger };
  });

  afterEach(() => {
    removeDir(root);
  });

  it("registers the top-most missing directory", async () => {
    const target = path.join(root, "a", "b", "c");
    const result = await ensureDirectory(target, ctx);

    expect(result.outcome).toBe("CREATED");
    expect(ledger.entries().map((e) => [e.kind, e.path])).toEqual([
      ["CREATED_DIRECTORY", path.join(root, "a")],
    ]);

    await ledger.rollback();
    expect(fs.existsSync(path.join(root, "a"))).toBe(false);
  });

  it("leaves an existing directory alone", async () => {
    const result = await ensureDirectory(root, ctx);
    expect(result.outcome).toBe("ALREADY_SATISFIED");
    expect(ledger.size).toBe(0);
  });

  it("fails when a file sits where the directory should be", async () => {
    const file = path.join(root, "blocker");
    fs.writeFileSync(file, "x");
    const result = await ensureDirectory(file, ctx);
    expect(result.outcome).toBe("FAILED");
    expect(result.error?.category).toBe("FILE_ERROR");
    expect(result.error?.message).toBe(`${file} exists and is not a directory`);
  });

  it("writes a new file and registers it", async () => {
    const file = path.join(root, "conf", "settings.ini");
    const result = await writeFileIdempotent(file, "a=1\n", ctx);

    expect(result.outcome).toBe("CREATED");
    expect(fs.readFileSync(file, "utf-8")).toBe("a=1\n");
    expect(ledger.entries().map((e) => e.kind)).toEqual(["CREATED_DIRECTORY", "CREATED_FILE"]);
  });

  it("skips a write when the content already matches", async () => {
    const file = path.join(root, "same.txt");
    fs.writeFileSync(file, "same");
    const result = await writeFileIdempotent(file, "same", ctx);
    expect(result.outcome).toBe("ALREADY_SATISFIED");
    expect(ledger.size).toBe(0);
  });

  it("backs up an existing file before overwriting and restores it on rollback", async () => {
    const file = path.join(root, "config.json");
    fs.writeFileSync(file, "old");

    const result = await writeFileIdempotent(file, "new", ctx);

    expect(result.outcome).toBe("CREATED");
    expect(result.backupPath).toBe(`${file}.bak`);
    expect(fs.readFileSync(`${file}.bak`, "utf-8")).toBe("old");
    expect(fs.readFileSync(file, "utf-8")).toBe("new");

    await ledger.rollback();
    expect(fs.readFileSync(file, "utf-8")).toBe("old");
    expect(fs.existsSync(`${file}.bak`)).toBe(false);
  });

  it("copies unless the destination already has the same bytes", async () => {
    const source = path.join(root, "src.bin");
    const dest = path.join(root, "out", "dest.bin");
    fs.writeFileSync(source, "payload");

    expect((await copyFileIdempotent(source, dest, ctx)).outcome).toBe("CREATED");
    expect((await copyFileIdempotent(source, dest, ctx)).outcome).toBe("ALREADY_SATISFIED");
    expect(fs.readFileSync(dest, "utf-8")).toBe("payload");
  });

  it("fails a copy from a missing source", async () => {
    const result = await copyFileIdempotent(path.join(root, "nope"), path.join(root, "dest"), ctx);
    expect(result.outcome).toBe("FAILED");
    expect(result.error?.message).toBe(`Source file not found: ${path.join(root, "nope")}`);
  });

  it("numbers backups when one already exists", () => {
    const file = path.join(root, "x.ini");
    fs.writeFileSync(`${file}.bak`, "");
    fs.writeFileSync(`${file}.bak.1`, "");
    expect(nextBackupPath(file)).toBe(`${file}.bak.2`);
    expect(nextBackupPath(file, path.join(root, "backups"))).toBe(
      path.join(root, "backups", "x.ini.bak"),
    );
  });
});

describe("classifyFsError", () => {
  const fsError = (code: string) => Object.assign(new Error(`${code}: failed`), { code });

  it("treats a busy file as transient", () => {
    const err = classifyFsError(fsError("EBUSY"), "linux");
    expect(err.kind).toBe("transient");
    expect(err.category).toBe("FILE_ERROR");
  });

  it("treats EPERM as a locked file on Windows", () => {
    const err = classifyFsError(fsError("EPERM"), "win32");
    expect(err.kind).toBe("transient");
    expect(err.message).toBe("EPERM: failed (file may be in use)");
  });

  it("treats EACCES elsewhere as a permission error", () => {
    const err = classifyFsError(fsError("EACCES"), "linux");
    expect(err.kind).toBe("permanent");
    expect(err.category).toBe("PERMISSION_ERROR");
    expect(exitCodeForCategory(err.category)).toBe(EXIT_CODES.PERMISSION_ERROR);
  });

  it("passes SetupErrors through", () => {
    const original = new SetupError("x", "transient", "NETWORK_ERROR");
    expect(classifyFsError(original)).toBe(original);
  });
});
