/**
 * Delimited Import Reader
 *
 * Reads question/answer pairs from comma-separated (or other single-character
 * delimited) text. There is no header row: every non-blank record is one
 * pair, question first.
 *
 * Quoting follows the usual CSV rules:
 * - a field wrapped in double quotes may contain the delimiter and newlines
 * - a doubled quote inside a quoted field stands for one quote
 * - records end at LF or CRLF
 *
 * Any record that does not have exactly two fields fails the whole import,
 * so a file is never half imported.
 */

import { readFile } from 'node:fs/promises';
import { ImportFormatError } from '../errors';
import type { QuestionAnswerPair } from '../models';

/** Delimiter used when none is configured. */
export const DEFAULT_DELIMITER = ',';

const QUOTE = '"';

/**
 * A parsed record with the line number it started on.
 */
interface RawRecord {
  line: number;
  fields: string[];
}

/**
 * Checks that a delimiter can be used to split records.
 *
 * @throws {Error} if the delimiter is not a single character, or is a quote
 *   or line break
 */
export function assertValidDelimiter(delimiter: string): void {
  if (delimiter.length !== 1) {
    throw new Error(`Delimiter must be a single character, got '${delimiter}'`);
  }
  if (delimiter === QUOTE || delimiter === '\n' || delimiter === '\r') {
    throw new Error('Delimiter cannot be a double quote or a line break');
  }
}

/**
 * Splits text into records and fields.
 *
 * Blank lines outside quotes produce no record.
 */
function tokenize(text: string, delimiter: string, source: string): RawRecord[] {
  const records: RawRecord[] = [];

  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  // Whether the current record has any content, including an empty quoted field
  let started = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = (): void => {
    if (started) {
      fields.push(field);
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = '';
    started = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === QUOTE) {
        if (text[i + 1] === QUOTE) {
          field += QUOTE;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n' || (char === '\r' && text[i + 1] !== '\n')) {
          line++;
        }
        field += char;
      }
      continue;
    }

    if (char === '\r' && text[i + 1] === '\n') {
      continue;
    }

    // A lone carriage return ends a record the same way a newline does
    if (char === '\n' || char === '\r') {
      endRecord();
      line++;
      recordLine = line;
      continue;
    }

    if (!started) {
      started = true;
      recordLine = line;
    }

    if (char === delimiter) {
      fields.push(field);
      field = '';
    } else if (char === QUOTE && field === '') {
      inQuotes = true;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new ImportFormatError('Unterminated quoted field', source, recordLine);
  }
  endRecord();

  return records;
}

/**
 * Parses delimited text into question/answer pairs.
 *
 * @param text - File contents
 * @param delimiter - Field separator (defaults to a comma)
 * @param source - Name used in error messages, usually the file path
 * @returns One pair per record, in file order
 * @throws {ImportFormatError} on the first record without exactly two fields
 *
 * @example
 * ```typescript
 * parseDelimited('2+2,4\n3+3,6\n');
 * // [{ question: '2+2', answer: '4' }, { question: '3+3', answer: '6' }]
 * ```
 */
export function parseDelimited(
  text: string,
  delimiter: string = DEFAULT_DELIMITER,
  source: string = '<input>'
): QuestionAnswerPair[] {
  assertValidDelimiter(delimiter);

  // Strip a leading byte order mark
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;

  return tokenize(body, delimiter, source).map((record) => {
    if (record.fields.length !== 2) {
      throw new ImportFormatError(
        `Expected 2 fields (question${delimiter}answer), found ${record.fields.length}`,
        source,
        record.line
      );
    }
    const [question, answer] = record.fields;
    return { question, answer };
  });
}

/**
 * Reads and parses an import file as UTF-8.
 *
 * @throws {ImportFormatError} if the file cannot be read or has a bad record
 */
export async function readImportFile(
  path: string,
  delimiter: string = DEFAULT_DELIMITER
): Promise<QuestionAnswerPair[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ImportFormatError(`Cannot read file (${reason})`, path);
  }
  return parseDelimited(text, delimiter, path);
}
