/**
 * Review Command Handler
 *
 * Runs an interactive review session over the due items:
 *
 * 1. Load the collection (optionally limited to some decks)
 * 2. Show a banner with the number of due items
 * 3. For each item, print its status line and question, wait for
 *    [a]nswer or [q]uit, then print the answer and wait for
 *    [r]ecalled or [f]orgot
 * 4. Save each item as soon as it is judged
 * 5. Print a summary and when the next review is due
 *
 * When a speech command is configured the question and answer are read
 * aloud before each prompt.
 *
 * Usage (via CLI):
 * ```bash
 * interval-drill
 * interval-drill --decks spanish,german
 * ```
 */

import type { Item } from '../../core/models';
import { ReviewSession, type ReviewDecision, type ReviewPresenter, type SessionSummary } from '../../core/session';
import { Scheduler, type IntervalTable } from '../../core/scheduling';
import type { Speaker } from '../../core/speech';
import type { ItemRepository } from '../../storage/repositories';
import type { Prompter } from '../utils/prompt';
import {
  cyan,
  dim,
  yellow,
  printBlankLine,
  printNextReview,
  printSessionAbandoned,
  printSessionBanner,
  printSessionComplete,
  formatItemStatus,
} from '../utils/terminal';

const QUESTION_PROMPT = 'reveal [a]nswer, [q]uit: ';
const ANSWER_PROMPT = '[r]ecalled, [f]orgot: ';

/**
 * Presents items on the terminal and reads single-letter judgments.
 *
 * Unrecognized input repeats the prompt. End of input counts as quitting.
 * A failing speech command is reported once, after which speech is skipped
 * for the rest of the session.
 */
export class TerminalPresenter implements ReviewPresenter {
  private speechEnabled = true;

  constructor(
    private readonly prompter: Prompter,
    private readonly speaker: Speaker
  ) {}

  async present(item: Item): Promise<ReviewDecision> {
    console.log(dim(formatItemStatus(item)));

    for (;;) {
      console.log(`Q: ${cyan(item.question)}`);
      const key = await this.ask(QUESTION_PROMPT, item.question);
      if (key === null || key === 'q') {
        return 'quit';
      }
      if (key === 'a') {
        break;
      }
    }

    for (;;) {
      console.log(`A: ${cyan(item.answer)}`);
      const key = await this.ask(ANSWER_PROMPT, item.answer);
      if (key === null) {
        return 'quit';
      }
      if (key === 'r') {
        printBlankLine();
        return 'correct';
      }
      if (key === 'f') {
        printBlankLine();
        return 'incorrect';
      }
    }
  }

  /**
   * Speaks `spoken` (when enabled), then prompts. Returns the trimmed,
   * lower-cased input or null at end of input.
   */
  private async ask(prompt: string, spoken: string): Promise<string | null> {
    if (this.speechEnabled) {
      try {
        await this.speaker.speak(spoken);
      } catch (error) {
        this.speechEnabled = false;
        const reason = error instanceof Error ? error.message : String(error);
        console.log(yellow(`Warning: ${reason}. Continuing without speech.`));
      }
    }

    const line = await this.prompter.ask(prompt);
    return line === null ? null : line.trim().toLowerCase();
  }
}

/**
 * Everything the review command needs, created by the CLI entry point.
 */
export interface ReviewCommandContext {
  itemRepo: ItemRepository;
  table: IntervalTable;
  /** Decks to review; empty means all decks */
  decks: readonly string[];
  /** Presenter for the session; tests pass a scripted one */
  presenter: ReviewPresenter;
  /** Source of the current time (defaults to `() => new Date()`) */
  clock?: () => Date;
}

/**
 * Runs the review command.
 *
 * @returns The session summary, or null when no session was started
 *   because the collection was empty or nothing was due
 */
export async function runReviewCommand(context: ReviewCommandContext): Promise<SessionSummary | null> {
  const clock = context.clock ?? (() => new Date());
  const items = await context.itemRepo.findAll({ decks: context.decks });

  if (items.length === 0) {
    console.log(yellow('No items found.'));
    printNextReview(null);
    return null;
  }

  const scheduler = new Scheduler(context.table, items);
  const dueCount = scheduler.countDue(clock());

  if (dueCount === 0) {
    console.log(yellow('No items are due for review.'));
    printNextReview(scheduler.nextDueAt());
    return null;
  }

  printSessionBanner(dueCount, context.decks);

  const session = new ReviewSession({
    scheduler,
    presenter: context.presenter,
    store: context.itemRepo,
    clock,
  });
  const summary = await session.run();

  if (summary.quit) {
    printSessionAbandoned(summary);
  } else {
    printSessionComplete(summary);
  }
  printNextReview(summary.nextDueAt);

  return summary;
}
