/**
 * Chat Session (turn processor)
 *
 * One per process. Owns the conversation store and the reload policy, and
 * runs each turn as: check staleness -> (rebuild) -> append user entry ->
 * call the model -> append assistant entry.
 *
 * Turns are serialized: a process()/reload() issued while another turn is in
 * flight waits for it, so check-rebuild-append is one exclusive section.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@dirchat/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { ILLMClient, LLMRequestOptions } from "../llm/types.js";
import { ContextStore, createMessageEntry, type ConversationEntry } from "../context/store.js";
import { ReloadPolicy, type ReloadOutcome } from "../context/reload-policy.js";
import type { BriefingOptions } from "../context/briefing.js";

export type TurnState = "idle" | "checking" | "rebuilding" | "appending" | "awaiting_model";

export interface SessionOptions {
  /** Directory whose files are exposed to the model */
  directory: string;
  client: ILLMClient;
  /** Session id for log correlation (default: random) */
  id?: string;
  request?: LLMRequestOptions;
  briefing?: Omit<BriefingOptions, "logger">;
  logger?: ILogger;
}

export class Session {
  readonly id: string;
  readonly directory: string;
  private client: ILLMClient;
  private request: LLMRequestOptions;
  private store = new ContextStore();
  private policy: ReloadPolicy;
  private log: ILogger;
  private current: TurnState = "idle";
  private tail: Promise<void> = Promise.resolve();

  constructor(options: SessionOptions) {
    this.id = options.id ?? nanoid(10);
    this.directory = options.directory;
    this.client = options.client;
    this.request = options.request ?? {};
    this.log = options.logger ?? createComponentLogger("session");
    this.policy = new ReloadPolicy(this.directory, this.store, {
      ...options.briefing,
      logger: this.log.child({ component: "agent.context" }),
    });
  }

  get state(): TurnState {
    return this.current;
  }

  get rebuildCount(): number {
    return this.policy.rebuildCount;
  }

  entries(): readonly ConversationEntry[] {
    return this.store.entries();
  }

  /**
   * Run one turn and return the model's raw reply.
   *
   * If the model call fails the error propagates and the user entry stays in
   * the log without a reply; nothing is retried or rolled back.
   */
  process(prompt: string): Promise<string> {
    return this.exclusive(async () => {
      const turnLog = this.log.child({ correlationId: nanoid() });
      try {
        this.transition("checking", turnLog);
        const check = await this.policy.checkAndReload({
          onRebuild: () => this.transition("rebuilding", turnLog),
        });
        if (check.reloaded) {
          turnLog.info("File context reloaded", { reason: check.reason, files: check.build?.included.length ?? 0 });
        }

        this.transition("appending", turnLog);
        this.store.append(createMessageEntry("user", prompt));

        this.transition("awaiting_model", turnLog);
        const response = await this.client.chat(this.store.toMessages(), this.request);

        this.transition("appending", turnLog);
        this.store.append(createMessageEntry("assistant", response.content));

        turnLog.debug("Turn complete", {
          entries: this.store.size,
          model: response.model,
          inputTokens: response.usage?.inputTokens,
          outputTokens: response.usage?.outputTokens,
        });
        return response.content;
      } finally {
        this.transition("idle", turnLog);
      }
    });
  }

  /** Explicit rebuild of the file context, regardless of staleness */
  reload(): Promise<ReloadOutcome> {
    return this.exclusive(async () => {
      try {
        this.transition("rebuilding", this.log);
        return await this.policy.reload();
      } finally {
        this.transition("idle", this.log);
      }
    });
  }

  private transition(next: TurnState, log: ILogger): void {
    log.trace("Turn state", { from: this.current, to: next });
    this.current = next;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The caller sees the rejection through `run`; the chain only needs to settle
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
