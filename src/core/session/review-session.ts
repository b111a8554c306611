/**
 * ReviewSession - Interactive Review Loop
 *
 * Runs one review session over a scheduler's collection:
 *
 * 1. Read the clock once and take the items due at that instant
 * 2. Present each one, apply the operator's judgment, save the item
 * 3. Repeat with a fresh clock reading, so items forgotten in the previous
 *    pass (due again immediately) come back until they are recalled
 * 4. Stop when a pass finds nothing due, or when the operator quits
 *
 * Each item is saved as soon as it is reviewed, so quitting or a crash
 * loses at most the item being shown. Items not reached stay unchanged and
 * remain due.
 */

import type {
  ReviewPresenter,
  ReviewSessionDependencies,
  ReviewedItemStore,
  SessionSummary,
} from './types';
import type { Scheduler } from '../scheduling/scheduler';

/**
 * Drives presentation, review and persistence for one session.
 *
 * @example
 * ```typescript
 * const session = new ReviewSession({
 *   scheduler,
 *   presenter: new TerminalPresenter(prompter, speaker),
 *   store: itemRepo,
 * });
 * const summary = await session.run();
 * ```
 */
export class ReviewSession {
  private readonly scheduler: Scheduler;
  private readonly presenter: ReviewPresenter;
  private readonly store: ReviewedItemStore;
  private readonly clock: () => Date;

  constructor(deps: ReviewSessionDependencies) {
    this.scheduler = deps.scheduler;
    this.presenter = deps.presenter;
    this.store = deps.store;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Runs passes over the due items until none are left or the operator quits.
   *
   * @throws Whatever the presenter or store throws; items saved before the
   *   failure stay saved
   */
  async run(): Promise<SessionSummary> {
    let correct = 0;
    let incorrect = 0;

    for (;;) {
      const now = this.clock();
      let presented = 0;

      for (const item of this.scheduler.dueItems(now)) {
        presented++;
        const decision = await this.presenter.present(item);

        if (decision === 'quit') {
          return this.summarize(correct, incorrect, true);
        }

        // Stamp the review with the time the judgment was given
        this.scheduler.review(item, decision, this.clock());
        await this.store.save(item);

        if (decision === 'correct') {
          correct++;
        } else {
          incorrect++;
        }
      }

      if (presented === 0) {
        return this.summarize(correct, incorrect, false);
      }
    }
  }

  private summarize(correct: number, incorrect: number, quit: boolean): SessionSummary {
    return {
      reviewed: correct + incorrect,
      correct,
      incorrect,
      quit,
      nextDueAt: this.scheduler.nextDueAt(),
    };
  }
}
