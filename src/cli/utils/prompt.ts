/**
 * Line Prompter
 *
 * Thin wrapper over Node's readline that asks one question at a time and
 * reports end of input (Ctrl+D, or a closed pipe) as `null` rather than
 * hanging.
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';

/**
 * Asks the operator for one line at a time.
 */
export interface Prompter {
  /**
   * Shows `prompt` and waits for a line.
   *
   * @returns The line without its line ending, or null at end of input
   */
  ask(prompt: string): Promise<string | null>;

  /** Releases the input stream. */
  close(): void;
}

/**
 * Creates a Prompter reading from `input` and echoing prompts to `output`.
 *
 * @example
 * ```typescript
 * const prompter = createPrompter();
 * const answer = await prompter.ask('reveal [a]nswer, [q]uit: ');
 * prompter.close();
 * ```
 */
export function createPrompter(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(prompt: string): Promise<string | null> {
      rl.setPrompt(prompt);
      rl.prompt();
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
