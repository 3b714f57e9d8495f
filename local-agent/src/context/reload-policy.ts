/**
 * Reload Policy
 *
 * Decides before each turn whether the briefing is stale. The automatic
 * check rebuilds only when the directory snapshot changed; the explicit
 * reload always rebuilds. Both record the snapshot they built from.
 */

import type { ILogger } from "@dirchat/shared/logging";
import { createComponentLogger } from "../logging.js";
import { scanDirectory, snapshotsEqual, type Snapshot } from "./snapshot.js";
import { buildBriefingFromScan, type BriefingBuild, type BriefingOptions } from "./briefing.js";
import { ContextStore, createBriefingEntry } from "./store.js";

export type ReloadReason = "initial" | "changed" | "unchanged" | "explicit";

export interface ReloadOutcome {
  reloaded: boolean;
  reason: ReloadReason;
  /** Present whenever the builder ran */
  build?: BriefingBuild;
}

export interface CheckHooks {
  /** Called after staleness is decided and before the builder starts */
  onRebuild?: (reason: ReloadReason) => void;
}

export class ReloadPolicy {
  private last: Snapshot | undefined;
  private rebuilds = 0;
  private log: ILogger;

  constructor(
    private readonly directory: string,
    private readonly store: ContextStore,
    private readonly options: BriefingOptions = {}
  ) {
    this.log = options.logger ?? createComponentLogger("context.reload");
  }

  get lastSnapshot(): Snapshot | undefined {
    return this.last;
  }

  /** Number of times the builder has run */
  get rebuildCount(): number {
    return this.rebuilds;
  }

  /**
   * Compare a fresh snapshot with the last observed one and rebuild on any
   * difference. The first call always rebuilds.
   */
  async checkAndReload(hooks: CheckHooks = {}): Promise<ReloadOutcome> {
    const scan = await scanDirectory(this.directory, this.options);

    if (snapshotsEqual(this.last, scan.snapshot)) {
      this.log.debug("File context up to date", { files: scan.snapshot.length });
      return { reloaded: false, reason: "unchanged" };
    }

    const reason: ReloadReason = this.last === undefined ? "initial" : "changed";
    this.log.debug("File context stale, rebuilding", { reason });
    hooks.onRebuild?.(reason);

    const build = await buildBriefingFromScan(this.directory, scan, this.options);
    this.apply(build);
    this.last = scan.snapshot;
    return { reloaded: true, reason, build };
  }

  /** Unconditional rebuild; also resets the baseline for checkAndReload() */
  async reload(): Promise<ReloadOutcome> {
    const scan = await scanDirectory(this.directory, this.options);
    const build = await buildBriefingFromScan(this.directory, scan, this.options);
    this.apply(build);
    this.last = scan.snapshot;
    return { reloaded: true, reason: "explicit", build };
  }

  private apply(build: BriefingBuild): void {
    this.rebuilds++;
    if (build.briefing === null) {
      this.store.removeBriefing();
      return;
    }
    this.store.insertBriefing(createBriefingEntry(build.briefing, this.directory, build.included));
  }
}
