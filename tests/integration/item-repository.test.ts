/**
 * ItemRepository Integration Tests
 *
 * Runs against an in-memory SQLite database with the real schema.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PersistenceError } from '../../src/core/errors';
import {
  at,
  cleanupTestDatabase,
  createTestDatabase,
  makeItem,
  T0,
  type TestDatabaseContext,
} from '../setup';

describe('ItemRepository', () => {
  let context: TestDatabaseContext;

  beforeEach(async () => {
    context = await createTestDatabase();
  });

  afterEach(() => {
    cleanupTestDatabase(context);
  });

  describe('insertMany / findById', () => {
    it('round-trips a never-reviewed item', async () => {
      const item = makeItem({ question: 'What is 2+2?', answer: '4' });

      await context.itemRepo.insertMany([item]);
      const loaded = await context.itemRepo.findById(item.id);

      expect(loaded).toEqual(item);
      expect(loaded?.lastReviewedAt).toBeNull();
    });

    it('round-trips scheduling state and review history exactly', async () => {
      const item = makeItem({
        deck: 'capitals',
        step: 2,
        dueAt: at(5.5),
        lastReviewedAt: at(2.25),
        history: [
          { reviewedAt: at(1), outcome: 'correct' },
          { reviewedAt: at(2.25), outcome: 'incorrect' },
        ],
      });

      await context.itemRepo.insertMany([item]);
      const loaded = await context.itemRepo.findById(item.id);

      expect(loaded).toEqual(item);
      expect(loaded?.dueAt.getTime()).toBe(T0.getTime() + 5.5 * 3_600_000);
    });

    it('returns null for an unknown id', async () => {
      await expect(context.itemRepo.findById('item_missing')).resolves.toBeNull();
    });

    it('stores more items than fit in one insert batch', async () => {
      const batch = Array.from({ length: 250 }, () => makeItem());

      await context.itemRepo.insertMany(batch);

      const loaded = await context.itemRepo.findAll();
      expect(loaded.map((item) => item.id)).toEqual(batch.map((item) => item.id));
    });

    it('writes nothing when one item in the batch is rejected', async () => {
      const existing = makeItem();
      await context.itemRepo.insertMany([existing]);

      const fresh = makeItem();
      await expect(context.itemRepo.insertMany([fresh, existing])).rejects.toBeInstanceOf(
        PersistenceError
      );

      await expect(context.itemRepo.findById(fresh.id)).resolves.toBeNull();
    });
  });

  describe('findAll', () => {
    it('returns items in insertion order', async () => {
      const first = makeItem({ id: 'item_zzz' });
      const second = makeItem({ id: 'item_aaa' });
      await context.itemRepo.insertMany([first]);
      await context.itemRepo.insertMany([second]);

      const loaded = await context.itemRepo.findAll();

      expect(loaded.map((item) => item.id)).toEqual(['item_zzz', 'item_aaa']);
    });

    it('filters by deck', async () => {
      const spanish = makeItem({ deck: 'spanish' });
      const german = makeItem({ deck: 'german' });
      const other = makeItem();
      await context.itemRepo.insertMany([spanish, german, other]);

      const loaded = await context.itemRepo.findAll({ decks: ['german', 'spanish'] });

      expect(loaded.map((item) => item.id)).toEqual([spanish.id, german.id]);
    });

    it('returns every deck for an empty filter', async () => {
      await context.itemRepo.insertMany([makeItem({ deck: 'a' }), makeItem({ deck: 'b' })]);

      await expect(context.itemRepo.findAll({ decks: [] })).resolves.toHaveLength(2);
    });
  });

  describe('save', () => {
    it('persists the fields changed by a review', async () => {
      const item = makeItem();
      await context.itemRepo.insertMany([item]);

      item.step = 1;
      item.lastReviewedAt = at(1);
      item.dueAt = at(2);
      item.history.push({ reviewedAt: at(1), outcome: 'correct' });
      await context.itemRepo.save(item);

      await expect(context.itemRepo.findById(item.id)).resolves.toEqual(item);
    });

    it('rejects an item that was never stored', async () => {
      const item = makeItem({ id: 'item_ghost' });

      await expect(context.itemRepo.save(item)).rejects.toThrow(
        "Item 'item_ghost' does not exist in the database"
      );
    });

    it('wraps driver failures in PersistenceError', async () => {
      const item = makeItem();
      await context.itemRepo.insertMany([item]);
      context.db.sqlite.exec('DROP TABLE items');

      const error = await context.itemRepo.save(item).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ message: `Failed to save item '${item.id}'` });
      expect(error instanceof Error && error.cause instanceof Error).toBe(true);
    });
  });

  describe('listDecks', () => {
    it('counts items and due items per deck, sorted by name', async () => {
      await context.itemRepo.insertMany([
        makeItem({ deck: 'spanish', dueAt: at(0) }),
        makeItem({ deck: 'spanish', dueAt: at(48) }),
        makeItem({ deck: 'german', dueAt: at(1) }),
      ]);

      await expect(context.itemRepo.listDecks(at(1))).resolves.toEqual([
        { deck: 'german', itemCount: 1, dueCount: 1 },
        { deck: 'spanish', itemCount: 2, dueCount: 1 },
      ]);
    });

    it('returns an empty list for an empty collection', async () => {
      await expect(context.itemRepo.listDecks(T0)).resolves.toEqual([]);
    });
  });
});
