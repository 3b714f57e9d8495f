/**
 * Directory Snapshot Tests
 *
 * Uses a real temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as path from "path";
import * as os from "os";
import { scanDirectory, takeSnapshot, snapshotsEqual, isEligibleName, type FileRecord } from "./snapshot.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "dirchat-snapshot-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function write(name: string, content: string): Promise<void> {
  await fs.writeFile(path.join(dir, name), content);
}

describe("isEligibleName", () => {
  it("matches the allowed extensions case-insensitively", () => {
    expect(isEligibleName("README.MD")).toBe(true);
    expect(isEligibleName("main.tf")).toBe(true);
    expect(isEligibleName("prod.tfvars")).toBe(true);
    expect(isEligibleName("config.Yml")).toBe(true);
    expect(isEligibleName("app.ts")).toBe(false);
    expect(isEligibleName("Makefile")).toBe(false);
    expect(isEligibleName("archive.tar.gz")).toBe(false);
  });

  it("excludes names listed in excludeNames", () => {
    expect(isEligibleName("agent.py", { excludeNames: new Set(["agent.py"]) })).toBe(false);
    expect(isEligibleName("other.py", { excludeNames: new Set(["agent.py"]) })).toBe(true);
  });

  it("honors a custom extension set", () => {
    expect(isEligibleName("a.csv", { extensions: new Set([".csv"]) })).toBe(true);
    expect(isEligibleName("a.md", { extensions: new Set([".csv"]) })).toBe(false);
  });
});

describe("scanDirectory", () => {
  it("records eligible regular files sorted by name", async () => {
    await write("notes.txt", "world");
    await write("a.md", "hello");
    await write("image.png", "binary");
    await fs.mkdir(path.join(dir, "sub.md"));

    const report = await scanDirectory(dir);

    expect(report.snapshot.map(r => r.name)).toEqual(["a.md", "notes.txt"]);
    expect(report.snapshot.map(r => r.sizeBytes)).toEqual([5, 5]);
    expect(typeof report.snapshot[0].modifiedNs).toBe("bigint");
    expect(report.skipped).toEqual([]);
  });

  it("does not recurse into subdirectories", async () => {
    await fs.mkdir(path.join(dir, "nested"));
    await fs.writeFile(path.join(dir, "nested", "deep.md"), "x");

    expect(await takeSnapshot(dir)).toEqual([]);
  });

  it("skips the excluded entry-point file", async () => {
    await write("agent.py", "print()");
    await write("tool.py", "print()");

    const snapshot = await takeSnapshot(dir, { excludeNames: new Set(["agent.py"]) });

    expect(snapshot.map(r => r.name)).toEqual(["tool.py"]);
  });

  it("reports a dangling symlink as skipped instead of throwing", async () => {
    await write("a.md", "hello");
    await fs.symlink(path.join(dir, "gone.md"), path.join(dir, "link.md"));

    const report = await scanDirectory(dir);

    expect(report.snapshot.map(r => r.name)).toEqual(["a.md"]);
    expect(report.skipped).toHaveLength(1);
    expect(report.skipped[0].name).toBe("link.md");
    expect(report.skipped[0].reason).toContain("ENOENT");
  });

  it("rejects when the directory itself is missing", async () => {
    await expect(scanDirectory(path.join(dir, "missing"))).rejects.toThrow(/ENOENT/);
  });
});

describe("snapshotsEqual", () => {
  const a: FileRecord = { name: "a.md", modifiedNs: 1n, sizeBytes: 5 };
  const b: FileRecord = { name: "b.md", modifiedNs: 2n, sizeBytes: 7 };

  it("compares name, mtime and size in order", () => {
    expect(snapshotsEqual([a, b], [{ ...a }, { ...b }])).toBe(true);
    expect(snapshotsEqual([a, b], [b, a])).toBe(false);
    expect(snapshotsEqual([a], [{ ...a, modifiedNs: 3n }])).toBe(false);
    expect(snapshotsEqual([a], [{ ...a, sizeBytes: 6 }])).toBe(false);
    expect(snapshotsEqual([a], [a, b])).toBe(false);
  });

  it("never treats a missing snapshot as equal", () => {
    expect(snapshotsEqual(undefined, [])).toBe(false);
    expect(snapshotsEqual(undefined, undefined)).toBe(false);
    expect(snapshotsEqual([], [])).toBe(true);
  });

  it("is stable for an untouched directory", async () => {
    await write("a.md", "hello");
    await write("b.json", "{}");

    expect(snapshotsEqual(await takeSnapshot(dir), await takeSnapshot(dir))).toBe(true);
  });
});
