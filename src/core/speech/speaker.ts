/**
 * Text-to-Speech
 *
 * Questions and answers can be read aloud by piping them to an external
 * program such as `espeak` or `say`. The command is run through the shell
 * with the text on its stdin, and the session waits for it to finish before
 * prompting, so speech and prompt never overlap.
 */

import { spawn } from 'node:child_process';
import { SpeechError } from '../errors';

/**
 * Anything that can vocalize a prompt.
 */
export interface Speaker {
  speak(text: string): Promise<void>;
}

/**
 * Runs a shell command with `input` on stdin and resolves with its exit code
 * (null when it was killed by a signal).
 */
export type RunCommand = (command: string, input: string) => Promise<number | null>;

/**
 * Default RunCommand backed by child_process.spawn. The command's stdout is
 * discarded and its stderr passed through to the terminal.
 */
export const runShellCommand: RunCommand = (command, input) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, {
      shell: true,
      stdio: ['pipe', 'ignore', 'inherit'],
    });

    child.once('error', reject);
    child.once('close', (code) => resolve(code));

    // EPIPE when the command exits without reading its input; the exit
    // code still reports the outcome
    child.stdin?.on('error', () => undefined);
    child.stdin?.end(input);
  });

/**
 * Speaker that pipes text to a configured shell command.
 *
 * @example
 * ```typescript
 * const speaker = new CommandSpeaker('espeak');
 * await speaker.speak('What is the capital of France?');
 * ```
 */
export class CommandSpeaker implements Speaker {
  constructor(
    private readonly command: string,
    private readonly run: RunCommand = runShellCommand
  ) {}

  /**
   * @throws {SpeechError} if the command cannot be started or exits non-zero
   */
  async speak(text: string): Promise<void> {
    let code: number | null;
    try {
      code = await this.run(this.command, text);
    } catch (error) {
      throw new SpeechError(`Could not run speech command '${this.command}'`, {
        cause: error,
      });
    }

    if (code !== 0) {
      throw new SpeechError(
        `Speech command '${this.command}' exited with ${code === null ? 'a signal' : `code ${code}`}`
      );
    }
  }
}

/** Speaker used when no speech command is configured. */
export const silentSpeaker: Speaker = {
  async speak(): Promise<void> {},
};
