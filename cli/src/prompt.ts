/**
 * Tandem CLI — Confirmation Prompts
 */

import * as readline from "readline";
import { Prompter, cancelledError } from "@tandem/engine";

export class ReadlinePrompter implements Prompter {
  /**
   * @param onInterrupt - called on Ctrl+C while a prompt is open. A terminal in
   *   raw mode hands Ctrl+C to readline instead of raising SIGINT.
   */
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    private readonly onInterrupt?: () => void,
  ) {}

  confirm(message: string, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.reject(cancelledError());

    const rl = readline.createInterface({ input: this.input, output: this.output });

    return new Promise<boolean>((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        outcome();
        rl.close();
      };
      const onAbort = () => settle(() => reject(cancelledError()));

      signal?.addEventListener("abort", onAbort, { once: true });
      rl.on("SIGINT", () => {
        settle(() => reject(cancelledError()));
        this.onInterrupt?.();
      });
      // Closed without an answer (input ended)
      rl.on("close", () => settle(() => reject(cancelledError())));

      rl.question(`${message} [y/N] `, (answer) => {
        settle(() => resolve(/^y(es)?$/i.test(answer.trim())));
      });
    });
  }
}

/** Answers every prompt the same way; used for non-interactive runs */
export class FixedPrompter implements Prompter {
  constructor(private readonly answer: boolean) {}

  async confirm(_message: string, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) throw cancelledError();
    return this.answer;
  }
}
