/**
 * CommandSpeaker Unit Tests
 *
 * The shell runner is replaced by an in-process fake so no program is
 * started.
 */

import { describe, it, expect, vi } from 'vitest';
import { CommandSpeaker, silentSpeaker, type RunCommand } from './speaker';
import { SpeechError } from '../errors';

describe('CommandSpeaker', () => {
  it('pipes the text to the configured command', async () => {
    const run = vi.fn<RunCommand>().mockResolvedValue(0);
    const speaker = new CommandSpeaker('espeak -s 150', run);

    await speaker.speak('What is the capital of France?');

    expect(run).toHaveBeenCalledWith('espeak -s 150', 'What is the capital of France?');
  });

  it('rejects with SpeechError on a non-zero exit code', async () => {
    const speaker = new CommandSpeaker('espeak', async () => 3);

    await expect(speaker.speak('hello')).rejects.toThrow(
      "Speech command 'espeak' exited with code 3"
    );
  });

  it('rejects with SpeechError when killed by a signal', async () => {
    const speaker = new CommandSpeaker('espeak', async () => null);

    await expect(speaker.speak('hello')).rejects.toThrow(
      "Speech command 'espeak' exited with a signal"
    );
  });

  it('wraps start-up failures and keeps the cause', async () => {
    const cause = new Error('spawn ENOENT');
    const speaker = new CommandSpeaker('missing-tts', async () => {
      throw cause;
    });

    const error = await speaker.speak('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SpeechError);
    expect(error).toMatchObject({
      message: "Could not run speech command 'missing-tts'",
      cause,
    });
  });
});

describe('silentSpeaker', () => {
  it('resolves without doing anything', async () => {
    await expect(silentSpeaker.speak('hello')).resolves.toBeUndefined();
  });
});
