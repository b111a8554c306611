/**
 * Decks Command Handler
 *
 * Lists every deck with its item count and how many items are due now.
 */

import type { DeckSummary, ItemRepository } from '../../storage/repositories';
import { bold, dim, yellow, formatSeparator, printBlankLine } from '../utils/terminal';

export interface DecksCommandContext {
  itemRepo: ItemRepository;
  clock?: () => Date;
}

export async function runDecksCommand(context: DecksCommandContext): Promise<DeckSummary[]> {
  const now = (context.clock ?? (() => new Date()))();
  const decks = await context.itemRepo.listDecks(now);

  printBlankLine();
  console.log(bold('Decks:'));
  console.log(formatSeparator(40));

  if (decks.length === 0) {
    console.log(yellow('  No decks found.'));
    console.log(dim('  Use the `add` command to import items.'));
  } else {
    const width = Math.max(...decks.map((d) => d.deck.length));
    for (const summary of decks) {
      const due = summary.dueCount > 0 ? yellow(`${summary.dueCount} due`) : dim('0 due');
      console.log(`  ${bold(summary.deck.padEnd(width))}  ${summary.itemCount} item(s), ${due}`);
    }
  }

  console.log(formatSeparator(40));
  printBlankLine();

  return decks;
}
