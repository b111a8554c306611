/**
 * Review Session Integration Tests
 *
 * Drives ReviewSession with a scripted presenter and a fixed clock, storing
 * reviewed items in an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ReviewSession, type ReviewDecision, type ReviewPresenter } from '../../src/core/session';
import { IntervalTable, Scheduler } from '../../src/core/scheduling';
import type { Item } from '../../src/core/models';
import {
  at,
  cleanupTestDatabase,
  createTestDatabase,
  makeItem,
  T0,
  type TestDatabaseContext,
} from '../setup';

/**
 * Presenter that answers from a per-question script and records what it
 * was shown. A question whose script is exhausted answers 'quit'.
 */
class ScriptedPresenter implements ReviewPresenter {
  readonly presented: string[] = [];
  private readonly scripts: Map<string, ReviewDecision[]>;

  constructor(scripts: Record<string, ReviewDecision[]>) {
    this.scripts = new Map(Object.entries(scripts).map(([q, d]) => [q, [...d]]));
  }

  async present(item: Item): Promise<ReviewDecision> {
    this.presented.push(item.question);
    return this.scripts.get(item.question)?.shift() ?? 'quit';
  }
}

describe('ReviewSession', () => {
  const table = IntervalTable.fromHours([0, 1, 3]);
  let context: TestDatabaseContext;

  beforeEach(async () => {
    context = await createTestDatabase();
  });

  afterEach(() => {
    cleanupTestDatabase(context);
  });

  async function seed(...seeded: Item[]): Promise<Scheduler> {
    await context.itemRepo.insertMany(seeded);
    return new Scheduler(table, await context.itemRepo.findAll());
  }

  it('brings forgotten items back until they are recalled', async () => {
    const scheduler = await seed(
      makeItem({ question: 'A' }),
      makeItem({ question: 'B' })
    );
    const presenter = new ScriptedPresenter({
      A: ['incorrect', 'correct'],
      B: ['correct'],
    });

    const summary = await new ReviewSession({
      scheduler,
      presenter,
      store: context.itemRepo,
      clock: () => T0,
    }).run();

    expect(presenter.presented).toEqual(['A', 'B', 'A']);
    expect(summary).toEqual({
      reviewed: 3,
      correct: 2,
      incorrect: 1,
      quit: false,
      nextDueAt: at(1),
    });
  });

  it('saves every reviewed item', async () => {
    const scheduler = await seed(makeItem({ question: 'A' }), makeItem({ question: 'B' }));

    await new ReviewSession({
      scheduler,
      presenter: new ScriptedPresenter({ A: ['incorrect', 'correct'], B: ['correct'] }),
      store: context.itemRepo,
      clock: () => T0,
    }).run();

    const stored = await context.itemRepo.findAll();
    expect(stored).toEqual(scheduler.items);
    expect(stored.map((item) => item.history.map((record) => record.outcome))).toEqual([
      ['incorrect', 'correct'],
      ['correct'],
    ]);
    expect(stored.map((item) => item.step)).toEqual([1, 1]);
  });

  it('stamps each review with the clock reading at judgment time', async () => {
    const scheduler = await seed(makeItem({ question: 'A' }));
    const readings = [at(0), at(0.5)];
    let calls = 0;

    await new ReviewSession({
      scheduler,
      presenter: new ScriptedPresenter({ A: ['correct'] }),
      store: context.itemRepo,
      clock: () => readings[Math.min(calls++, readings.length - 1)],
    }).run();

    const [item] = scheduler.items;
    expect(item.lastReviewedAt).toEqual(at(0.5));
    expect(item.dueAt).toEqual(at(1.5));
  });

  it('stops on quit and leaves unreached items due', async () => {
    const scheduler = await seed(
      makeItem({ question: 'A' }),
      makeItem({ question: 'B' }),
      makeItem({ question: 'C' })
    );
    const presenter = new ScriptedPresenter({ A: ['correct'], B: ['quit'] });

    const summary = await new ReviewSession({
      scheduler,
      presenter,
      store: context.itemRepo,
      clock: () => T0,
    }).run();

    expect(presenter.presented).toEqual(['A', 'B']);
    expect(summary).toEqual({
      reviewed: 1,
      correct: 1,
      incorrect: 0,
      quit: true,
      nextDueAt: T0,
    });

    const stored = await context.itemRepo.findAll();
    expect(stored.map((item) => item.step)).toEqual([1, 0, 0]);
    expect(stored.map((item) => item.lastReviewedAt)).toEqual([T0, null, null]);
  });

  it('presents nothing when no item is due', async () => {
    const scheduler = await seed(makeItem({ question: 'A', step: 1, dueAt: at(1) }));
    const presenter = new ScriptedPresenter({});

    const summary = await new ReviewSession({
      scheduler,
      presenter,
      store: context.itemRepo,
      clock: () => T0,
    }).run();

    expect(presenter.presented).toEqual([]);
    expect(summary).toEqual({
      reviewed: 0,
      correct: 0,
      incorrect: 0,
      quit: false,
      nextDueAt: at(1),
    });
  });

  it('propagates store failures after recording the review in memory', async () => {
    const scheduler = new Scheduler(table, [makeItem({ question: 'unsaved' })]);

    await expect(
      new ReviewSession({
        scheduler,
        presenter: new ScriptedPresenter({ unsaved: ['correct'] }),
        store: context.itemRepo,
        clock: () => T0,
      }).run()
    ).rejects.toThrow(/does not exist in the database/);

    expect(scheduler.items[0].step).toBe(1);
  });
});
