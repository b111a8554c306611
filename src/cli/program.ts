/**
 * Command-line program definition.
 *
 * Builds the commander program and wires configuration, storage, the
 * interval table and the terminal presenter into the command handlers.
 * The entry point (`index.ts`) only parses argv and reports errors; tests
 * build the program with their own dependencies and call `parseAsync`.
 *
 * Commands:
 * - (none)              Review the due items
 * - `add <files...>`    Import question/answer files
 * - `decks`             List decks with item and due counts
 */

import { Command, InvalidArgumentError } from 'commander';
import { applyOverrides, loadConfig, type Config } from '../config';
import { DEFAULT_DECK } from '../core/models';
import { assertValidDelimiter, DEFAULT_DELIMITER } from '../core/import';
import { IntervalTable } from '../core/scheduling';
import { CommandSpeaker, silentSpeaker, type Speaker } from '../core/speech';
import { createDatabase, closeDatabase, type AppDatabase } from '../storage/db';
import { ItemRepository } from '../storage/repositories';
import { runAddCommand } from './commands/add';
import { runDecksCommand } from './commands/decks';
import { printIntervals } from './commands/intervals';
import { runReviewCommand, TerminalPresenter } from './commands/review';
import { createPrompter, type Prompter } from './utils/prompt';

/**
 * Options accepted before or after any command.
 */
interface GlobalOptions {
  dbPath?: string;
  decks: string[];
  paramReviews?: number;
  paramHours?: number;
  showIntervals?: boolean;
  tts?: string;
}

interface AddOptions {
  delimiter: string;
  deck: string;
}

/**
 * Services the program creates at run time. Every field has a default
 * backed by the real process, database and terminal.
 */
export interface ProgramDependencies {
  /** Environment read for configuration (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Opens the database at a path (defaults to createDatabase) */
  openDatabase?: (path: string) => Promise<AppDatabase>;
  /** Creates the line reader used by the review session */
  createPrompter?: () => Prompter;
  /** Creates the speaker for a configured command, or for none */
  createSpeaker?: (command: string | undefined) => Speaker;
  /** Source of the current time */
  clock?: () => Date;
}

function defaultSpeaker(command: string | undefined): Speaker {
  return command ? new CommandSpeaker(command) : silentSpeaker;
}

// =============================================================================
// Option Parsers
// =============================================================================

function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
}

function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

/**
 * Splits a comma-separated deck list, dropping blanks.
 */
function parseDeckList(value: string): string[] {
  return value
    .split(',')
    .map((deck) => deck.trim())
    .filter((deck) => deck.length > 0);
}

/**
 * Accepts a single character, or the escape `\t` for a tab.
 */
function parseDelimiter(value: string): string {
  const delimiter = value === '\\t' ? '\t' : value;
  try {
    assertValidDelimiter(delimiter);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
  return delimiter;
}

function parseDeckName(value: string): string {
  const deck = value.trim();
  if (deck.length === 0) {
    throw new InvalidArgumentError('Deck name must not be empty.');
  }
  return deck;
}

// =============================================================================
// Program
// =============================================================================

/**
 * Creates the interval-drill command-line program.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const openDatabase = deps.openDatabase ?? createDatabase;
  const makePrompter = deps.createPrompter ?? (() => createPrompter());
  const makeSpeaker = deps.createSpeaker ?? defaultSpeaker;
  const clock = deps.clock ?? (() => new Date());

  const program = new Command('interval-drill')
    .description('Spaced repetition drills on the command line')
    .option('--db-path <path>', 'Path to the SQLite database')
    .option('--decks <list>', 'Only review these decks (comma-separated)', parseDeckList, [])
    .option('--param-reviews <n>', 'Correct reviews needed to reach the longest interval', parsePositiveInt)
    .option('--param-hours <n>', 'Longest interval, in hours', parseNonNegativeInt)
    .option('--show-intervals', 'Print the interval table and exit')
    .option('--tts <command>', 'Shell command that reads text aloud from stdin');

  /**
   * Resolves configuration from the environment and the global options.
   */
  const resolveConfig = (options: GlobalOptions): Config =>
    applyOverrides(loadConfig(env), {
      databasePath: options.dbPath,
      reviews: options.paramReviews,
      hours: options.paramHours,
      speechCommand: options.tts,
    });

  const tableFor = (config: Config): IntervalTable =>
    IntervalTable.fromGrowth({
      reviews: config.scheduling.reviews,
      hours: config.scheduling.hours,
    });

  /**
   * Opens the configured database for the duration of `action`.
   */
  const withRepository = async <T>(
    config: Config,
    action: (itemRepo: ItemRepository) => Promise<T>
  ): Promise<T> => {
    const db = await openDatabase(config.database.path);
    try {
      return await action(new ItemRepository(db));
    } finally {
      closeDatabase(db);
    }
  };

  program.action(async () => {
    const options = program.opts<GlobalOptions>();
    const config = resolveConfig(options);
    const table = tableFor(config);

    if (options.showIntervals) {
      printIntervals(table);
      return;
    }

    await withRepository(config, async (itemRepo) => {
      const prompter = makePrompter();
      try {
        await runReviewCommand({
          itemRepo,
          table,
          decks: options.decks,
          presenter: new TerminalPresenter(prompter, makeSpeaker(config.speech.command)),
          clock,
        });
      } finally {
        prompter.close();
      }
    });
  });

  program
    .command('add')
    .description('Import question/answer pairs from delimited text files')
    .argument('<files...>', 'Files with one question and answer per line')
    .option('-d, --delimiter <char>', 'Field separator (use \\t for tab)', parseDelimiter, DEFAULT_DELIMITER)
    .option('--deck <name>', 'Deck the new items join', parseDeckName, DEFAULT_DECK)
    .action(async (files: string[], options: AddOptions) => {
      const config = resolveConfig(program.opts<GlobalOptions>());
      await withRepository(config, (itemRepo) =>
        runAddCommand({
          itemRepo,
          table: tableFor(config),
          files,
          delimiter: options.delimiter,
          deck: options.deck,
          clock,
        })
      );
    });

  program
    .command('decks')
    .description('List decks with item and due counts')
    .action(async () => {
      const config = resolveConfig(program.opts<GlobalOptions>());
      await withRepository(config, (itemRepo) => runDecksCommand({ itemRepo, clock }));
    });

  return program;
}
