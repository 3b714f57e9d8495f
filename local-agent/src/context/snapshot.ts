/**
 * Directory Snapshot
 *
 * Lists the eligible files directly under a directory and reduces them to a
 * name/mtime/size fingerprint. Two snapshots compare equal iff nothing was
 * added, removed or modified.
 */

import { promises as fs } from "fs";
import * as path from "path";

export const DEFAULT_EXTENSIONS: ReadonlySet<string> = new Set([
  ".txt", ".md", ".py", ".json", ".yaml", ".yml", ".tf", ".tfvars",
]);

export interface FileRecord {
  readonly name: string;
  /** mtime in nanoseconds */
  readonly modifiedNs: bigint;
  readonly sizeBytes: number;
}

/** Sorted by name */
export type Snapshot = readonly FileRecord[];

export interface ScanSkip {
  name: string;
  reason: string;
}

export type ScanResult =
  | { status: "ok"; record: FileRecord }
  | { status: "skipped"; skip: ScanSkip }
  | { status: "ineligible" };

export interface ScanReport {
  snapshot: Snapshot;
  /** Eligible by name but failed to stat (usually deleted mid-scan) */
  skipped: ScanSkip[];
}

export interface ScanOptions {
  /** Lower-cased, with the leading dot */
  extensions?: ReadonlySet<string>;
  /** Exact file names never included, e.g. the agent's own entry point */
  excludeNames?: ReadonlySet<string>;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isEligibleName(name: string, options: ScanOptions = {}): boolean {
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  if (options.excludeNames?.has(name)) return false;
  return extensions.has(path.extname(name).toLowerCase());
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function scanEntry(dir: string, name: string, options: ScanOptions): Promise<ScanResult> {
  if (!isEligibleName(name, options)) {
    return { status: "ineligible" };
  }

  try {
    // stat follows symlinks: a link to a regular file counts as one
    const stats = await fs.stat(path.join(dir, name), { bigint: true });
    if (!stats.isFile()) {
      return { status: "ineligible" };
    }
    return {
      status: "ok",
      record: { name, modifiedNs: stats.mtimeNs, sizeBytes: Number(stats.size) },
    };
  } catch (error) {
    return { status: "skipped", skip: { name, reason: errorMessage(error) } };
  }
}

/**
 * Scan `dir` (no recursion). Per-file stat failures are reported in
 * `skipped`; only a failure to list the directory itself rejects.
 */
export async function scanDirectory(dir: string, options: ScanOptions = {}): Promise<ScanReport> {
  const names = (await fs.readdir(dir)).sort(compareNames);
  const results = await Promise.all(names.map(name => scanEntry(dir, name, options)));

  const snapshot: FileRecord[] = [];
  const skipped: ScanSkip[] = [];
  for (const result of results) {
    if (result.status === "ok") snapshot.push(result.record);
    else if (result.status === "skipped") skipped.push(result.skip);
  }

  return { snapshot, skipped };
}

export async function takeSnapshot(dir: string, options: ScanOptions = {}): Promise<Snapshot> {
  return (await scanDirectory(dir, options)).snapshot;
}

export function snapshotsEqual(a: Snapshot | undefined, b: Snapshot | undefined): boolean {
  if (a === undefined || b === undefined) return false;
  if (a.length !== b.length) return false;
  return a.every((record, i) => {
    const other = b[i];
    return record.name === other.name
      && record.modifiedNs === other.modifiedNs
      && record.sizeBytes === other.sizeBytes;
  });
}
