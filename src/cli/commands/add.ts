/**
 * Add Command Handler
 *
 * Imports question/answer pairs from delimited text files as new items.
 * Every file is parsed before anything is written, and all new items are
 * stored in one transaction, so a bad record in any file leaves the
 * collection unchanged.
 *
 * Usage (via CLI):
 * ```bash
 * interval-drill add capitals.csv
 * interval-drill add --deck german -d ';' nouns.txt verbs.txt
 * ```
 */

import type { Item, QuestionAnswerPair } from '../../core/models';
import { readImportFile } from '../../core/import';
import { Scheduler, type IntervalTable } from '../../core/scheduling';
import type { ItemRepository } from '../../storage/repositories';
import { bold, dim, green } from '../utils/terminal';

export interface AddCommandContext {
  itemRepo: ItemRepository;
  table: IntervalTable;
  /** Files to import, in order */
  files: readonly string[];
  /** Single-character field separator */
  delimiter: string;
  /** Deck the new items join */
  deck: string;
  clock?: () => Date;
}

/**
 * Runs the add command.
 *
 * @returns The items that were stored
 * @throws {ImportFormatError} if a file cannot be read or has a bad record
 * @throws {PersistenceError} if the items cannot be stored
 */
export async function runAddCommand(context: AddCommandContext): Promise<Item[]> {
  const parsed: { file: string; pairs: QuestionAnswerPair[] }[] = [];
  for (const file of context.files) {
    parsed.push({ file, pairs: await readImportFile(file, context.delimiter) });
  }

  // Item creation does not read the stored collection
  const scheduler = new Scheduler(context.table);
  const now = (context.clock ?? (() => new Date()))();

  const created: Item[] = [];
  const counts: { file: string; count: number }[] = [];
  for (const { file, pairs } of parsed) {
    const items = scheduler.addItems(pairs, { now, deck: context.deck });
    created.push(...items);
    counts.push({ file, count: items.length });
  }

  await context.itemRepo.insertMany(created);

  for (const { file, count } of counts) {
    console.log(
      `${green('✓')} Added ${bold(count.toString())} item(s) from ${file} to deck '${context.deck}'`
    );
  }
  if (created.length > 0) {
    console.log(dim('New items are due for review now.'));
  }

  return created;
}
