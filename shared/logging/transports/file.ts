/**
 * File Transport
 *
 * Appends JSON lines to <logDir>/<filename>-YYYY-MM-DD.log and rotates by size
 * (<name>.log.1 is the newest rotated file).
 */

import * as fs from "fs";
import * as path from "path";
import { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "dirchat") */
  filename?: string;
  /** Rotate once the current file would grow past this many bytes (default: 5MB) */
  maxSize?: number;
  /** Rotated files to keep besides the current one (default: 3) */
  maxFiles?: number;
  /** Clock used for the date in the filename */
  now?: () => Date;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private now: () => Date;
  private currentPath = "";
  private currentSize = 0;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "debug";
    this.logDir = options.logDir;
    this.filename = options.filename || "dirchat";
    this.maxSize = options.maxSize || 5 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 3;
    this.now = options.now ?? (() => new Date());

    fs.mkdirSync(this.logDir, { recursive: true });
    this.openFile();
  }

  get path(): string {
    return this.currentPath;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line, "utf-8");

    // New day, new file
    if (this.logPathForToday() !== this.currentPath) {
      this.openFile();
    }

    if (this.currentSize > 0 && this.currentSize + bytes > this.maxSize) {
      this.rotate();
    }

    fs.appendFileSync(this.currentPath, line, "utf-8");
    this.currentSize += bytes;
  }

  private logPathForToday(): string {
    const date = this.now().toISOString().split("T")[0];
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private openFile(): void {
    this.currentPath = this.logPathForToday();
    this.currentSize = fs.existsSync(this.currentPath) ? fs.statSync(this.currentPath).size : 0;
  }

  private rotate(): void {
    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }
    this.currentSize = 0;
  }
}
