/**
 * Context Builder
 *
 * Reads the eligible files of a directory and formats them into the single
 * system block ("briefing") that is pinned to the front of the conversation.
 * Same directory contents give a byte-identical briefing.
 */

import { promises as fs } from "fs";
import * as path from "path";
import type { ILogger } from "@dirchat/shared/logging";
import { createComponentLogger } from "../logging.js";
import {
  scanDirectory,
  errorMessage,
  type ScanOptions,
  type ScanReport,
  type ScanSkip,
} from "./snapshot.js";

export const FILE_CONTEXT_TAG = "__FILE_CONTEXT__";
export const DEFAULT_MAX_FILE_CHARS = 8_000;

const PREAMBLE =
  "You have access to the following files from the project directory. " +
  "Use them as context when answering. If the user asks about a file, " +
  "prefer quoting the relevant snippet and explaining it.";

export interface BriefingOptions extends ScanOptions {
  /** Per-file cap, in characters (code points) */
  maxFileChars?: number;
  logger?: ILogger;
}

export interface BriefingBuild {
  /** null when no file made it in */
  briefing: string | null;
  included: string[];
  /** Files that failed to stat or read */
  skipped: ScanSkip[];
}

/**
 * First `max` characters of `text`, counting code points so a surrogate
 * pair is never split.
 */
export function truncateChars(text: string, max: number): string {
  // Fast path: UTF-16 length is an upper bound on the code point count
  if (text.length <= max) return text;

  let count = 0;
  let end = 0;
  for (const char of text) {
    if (count === max) break;
    end += char.length;
    count++;
  }
  return text.slice(0, end);
}

export function formatFileBlock(name: string, content: string): string {
  return `File: ${name}\n---\n${content}\n`;
}

export function formatBriefing(dir: string, blocks: string[]): string {
  return `${FILE_CONTEXT_TAG}\nProject directory: ${dir}\n${PREAMBLE}\n\n` + blocks.join("\n");
}

/**
 * Build the briefing from an existing scan, reading exactly the files it
 * recorded.
 */
export async function buildBriefingFromScan(
  dir: string,
  scan: ScanReport,
  options: BriefingOptions = {}
): Promise<BriefingBuild> {
  const log = options.logger ?? createComponentLogger("context");
  const maxChars = options.maxFileChars ?? DEFAULT_MAX_FILE_CHARS;

  const included: string[] = [];
  const blocks: string[] = [];
  const skipped: ScanSkip[] = [...scan.skipped];
  for (const skip of scan.skipped) {
    log.warn("Skipped file", { name: skip.name, reason: skip.reason });
  }

  for (const { name } of scan.snapshot) {
    try {
      // Buffer decoding replaces invalid UTF-8 with U+FFFD instead of throwing
      const raw = await fs.readFile(path.join(dir, name));
      const content = truncateChars(raw.toString("utf-8"), maxChars);
      included.push(name);
      blocks.push(formatFileBlock(name, content));
    } catch (error) {
      const reason = errorMessage(error);
      skipped.push({ name, reason });
      log.warn("Skipped file", { name, reason });
    }
  }

  log.info(`Loaded ${included.length} files from ${dir}`, { files: included });

  return {
    briefing: blocks.length > 0 ? formatBriefing(dir, blocks) : null,
    included,
    skipped,
  };
}

export async function buildBriefing(dir: string, options: BriefingOptions = {}): Promise<BriefingBuild> {
  return buildBriefingFromScan(dir, await scanDirectory(dir, options), options);
}
