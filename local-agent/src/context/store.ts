/**
 * Context Store
 *
 * The ordered conversation log. Insertion order is conversation order,
 * except that the briefing entry (at most one) always sits at index 0.
 */

import { nanoid } from "nanoid";
import type { LLMMessage, LLMRole } from "../llm/types.js";

export interface BriefingEntry {
  readonly kind: "briefing";
  readonly id: string;
  readonly role: "system";
  readonly content: string;
  readonly directory: string;
  /** Names of the files included, in briefing order */
  readonly files: readonly string[];
}

export interface MessageEntry {
  readonly kind: "message";
  readonly id: string;
  readonly role: LLMRole;
  readonly content: string;
}

export type ConversationEntry = BriefingEntry | MessageEntry;

export function createMessageEntry(role: LLMRole, content: string): MessageEntry {
  const entry: MessageEntry = { kind: "message", id: nanoid(), role, content };
  return Object.freeze(entry);
}

export function createBriefingEntry(content: string, directory: string, files: readonly string[]): BriefingEntry {
  const entry: BriefingEntry = {
    kind: "briefing",
    id: nanoid(),
    role: "system",
    content,
    directory,
    files: Object.freeze([...files]),
  };
  return Object.freeze(entry);
}

export class ContextStore {
  private items: ConversationEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  /**
   * Replace the briefing. Any existing briefing is found by kind, wherever it
   * is, and removed; the new one goes to index 0.
   */
  insertBriefing(entry: BriefingEntry): void {
    this.items = [entry, ...this.items.filter(e => e.kind !== "briefing")];
  }

  /** Drop the briefing, if any. Returns whether one was removed. */
  removeBriefing(): boolean {
    const before = this.items.length;
    this.items = this.items.filter(e => e.kind !== "briefing");
    return this.items.length !== before;
  }

  append(entry: MessageEntry): void {
    // Runtime guard for untyped callers; the briefing only enters via insertBriefing
    const kind: string = entry.kind;
    if (kind !== "message") {
      throw new Error("Briefing entries must be added with insertBriefing()");
    }
    this.items.push(entry);
  }

  briefing(): BriefingEntry | undefined {
    const first = this.items[0];
    return first?.kind === "briefing" ? first : undefined;
  }

  entries(): readonly ConversationEntry[] {
    return [...this.items];
  }

  /** The conversation as the model sees it */
  toMessages(): LLMMessage[] {
    return this.items.map(e => ({ role: e.role, content: e.content }));
  }
}
