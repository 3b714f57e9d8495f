/**
 * CLI Front End
 *
 * One-shot: the joined arguments are a single prompt.
 * Interactive: a line-based REPL with /reload, /exit and /quit.
 */

import * as readline from "readline";
import type { Readable, Writable } from "stream";
import type { ILogger } from "@dirchat/shared/logging";
import type { ReloadOutcome } from "../context/reload-policy.js";

export const PROMPT = "> ";

/** The part of Session the front end drives */
export interface TurnRunner {
  process(prompt: string): Promise<string>;
  reload(): Promise<ReloadOutcome>;
}

export interface ReplIO {
  input: Readable;
  output: Writable;
  /** Enables line editing and Ctrl+C handling (default: output is a TTY) */
  terminal?: boolean;
}

export type ReplCommand =
  | { type: "exit" }
  | { type: "reload" }
  | { type: "prompt"; text: string }
  | { type: "empty" };

export function parseReplLine(line: string): ReplCommand {
  const trimmed = line.trim();
  if (!trimmed) return { type: "empty" };
  if (trimmed === "/exit" || trimmed === "/quit") return { type: "exit" };
  if (trimmed === "/reload") return { type: "reload" };
  return { type: "prompt", text: trimmed };
}

export function joinPromptArgs(args: string[]): string {
  return args.join(" ");
}

/** One-shot mode. Model errors propagate to the caller. */
export async function runOnce(runner: TurnRunner, args: string[], output: Writable): Promise<void> {
  const reply = await runner.process(joinPromptArgs(args));
  output.write(`${reply}\n`);
}

/**
 * Interactive mode. Resolves when the user exits, input ends or Ctrl+C is
 * pressed. A failed turn is logged and the loop carries on.
 */
export async function runRepl(runner: TurnRunner, io: ReplIO, log: ILogger): Promise<void> {
  const terminal = io.terminal ?? ("isTTY" in io.output && io.output.isTTY === true);
  const rl = readline.createInterface({ input: io.input, output: io.output, terminal });
  rl.setPrompt(PROMPT);

  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  // Ctrl+C ends the session like end-of-input does
  rl.on("SIGINT", () => rl.close());

  let exitedByCommand = false;
  rl.prompt();
  for await (const line of rl) {
    const command = parseReplLine(line);

    if (command.type === "exit") {
      exitedByCommand = true;
      break;
    }

    if (command.type === "reload") {
      try {
        await runner.reload();
        io.output.write(">>> file context reloaded\n\n");
      } catch (error) {
        log.error("Reload failed", error);
      }
    } else if (command.type === "prompt") {
      try {
        const reply = await runner.process(command.text);
        io.output.write(`>>> ${reply}\n\n`);
      } catch (error) {
        log.error("Turn failed", error);
      }
    }

    if (!closed) rl.prompt();
  }

  // Leaving the loop early does not close the interface by itself
  if (!closed) rl.close();
  io.output.write(exitedByCommand ? "Exiting.\n" : "\nExiting.\n");
}
