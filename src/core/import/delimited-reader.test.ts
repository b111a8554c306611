/**
 * Delimited Reader Unit Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { assertValidDelimiter, parseDelimited, readImportFile } from './delimited-reader';
import { ImportFormatError } from '../errors';

describe('parseDelimited', () => {
  it('reads one pair per line with the default comma delimiter', () => {
    expect(parseDelimited('2+2,4\n3+3,6\n')).toEqual([
      { question: '2+2', answer: '4' },
      { question: '3+3', answer: '6' },
    ]);
  });

  it('accepts a final record without a trailing newline', () => {
    expect(parseDelimited('a,b\nc,d')).toEqual([
      { question: 'a', answer: 'b' },
      { question: 'c', answer: 'd' },
    ]);
  });

  it('handles CRLF line endings and skips blank lines', () => {
    expect(parseDelimited('a,b\r\n\r\n\nc,d\r\n')).toEqual([
      { question: 'a', answer: 'b' },
      { question: 'c', answer: 'd' },
    ]);
  });

  it('treats a lone carriage return as a line break', () => {
    expect(parseDelimited('2+2,4\r3+3,6\r')).toEqual([
      { question: '2+2', answer: '4' },
      { question: '3+3', answer: '6' },
    ]);
  });

  it('counts lone carriage returns when numbering lines', () => {
    expect(() => parseDelimited('a,b\r"x\ry",z\rlonely\r', ',', 'f.csv')).toThrow(
      'f.csv:4: Expected 2 fields (question,answer), found 1'
    );
  });

  it('keeps delimiters, newlines and doubled quotes inside quoted fields', () => {
    const text = '"Paris, France","say ""bonjour"""\n"two\nlines",x\n';

    expect(parseDelimited(text)).toEqual([
      { question: 'Paris, France', answer: 'say "bonjour"' },
      { question: 'two\nlines', answer: 'x' },
    ]);
  });

  it('keeps empty fields', () => {
    expect(parseDelimited('question,\n"",answer\n')).toEqual([
      { question: 'question', answer: '' },
      { question: '', answer: 'answer' },
    ]);
  });

  it('splits on a custom delimiter only', () => {
    expect(parseDelimited('Hund;dog, hound\n', ';')).toEqual([
      { question: 'Hund', answer: 'dog, hound' },
    ]);
    expect(parseDelimited('eins\tone\n', '\t')).toEqual([{ question: 'eins', answer: 'one' }]);
  });

  it('strips a leading byte order mark', () => {
    expect(parseDelimited('\uFEFFa,b\n')).toEqual([{ question: 'a', answer: 'b' }]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseDelimited('')).toEqual([]);
    expect(parseDelimited('\n\n')).toEqual([]);
  });

  it('rejects a record with one field, naming its line', () => {
    let caught: unknown;
    try {
      parseDelimited('a,b\n\nlonely\nc,d\n', ',', 'cards.csv');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ImportFormatError);
    expect(caught).toMatchObject({
      name: 'ImportFormatError',
      source: 'cards.csv',
      line: 3,
      message: 'cards.csv:3: Expected 2 fields (question,answer), found 1',
    });
  });

  it('rejects a record with three fields', () => {
    expect(() => parseDelimited('a;b;c\n', ';', 'x.txt')).toThrow(
      'x.txt:1: Expected 2 fields (question;answer), found 3'
    );
  });

  it('reports the starting line of a record that spans lines', () => {
    expect(() => parseDelimited('a,b\n"multi\nline",b,c\n', ',', 'f.csv')).toThrow(
      'f.csv:2: Expected 2 fields (question,answer), found 3'
    );
  });

  it('rejects an unterminated quoted field', () => {
    expect(() => parseDelimited('a,b\n"open,b\n', ',', 'f.csv')).toThrow(
      'f.csv:2: Unterminated quoted field'
    );
  });
});

describe('assertValidDelimiter', () => {
  it('accepts single characters', () => {
    expect(() => assertValidDelimiter(',')).not.toThrow();
    expect(() => assertValidDelimiter('|')).not.toThrow();
    expect(() => assertValidDelimiter('\t')).not.toThrow();
  });

  it('rejects multi-character, quote and line break delimiters', () => {
    expect(() => assertValidDelimiter('::')).toThrow("Delimiter must be a single character, got '::'");
    expect(() => assertValidDelimiter('')).toThrow('Delimiter must be a single character');
    expect(() => assertValidDelimiter('"')).toThrow('Delimiter cannot be a double quote or a line break');
    expect(() => assertValidDelimiter('\n')).toThrow('Delimiter cannot be a double quote or a line break');
  });
});

describe('readImportFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'interval-drill-import-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads and parses a UTF-8 file', async () => {
    const path = join(dir, 'words.txt');
    writeFileSync(path, 'Straße|street\n', 'utf8');

    await expect(readImportFile(path, '|')).resolves.toEqual([
      { question: 'Straße', answer: 'street' },
    ]);
  });

  it('reports bad records with the file path', async () => {
    const path = join(dir, 'bad.csv');
    writeFileSync(path, 'only one field\n', 'utf8');

    await expect(readImportFile(path)).rejects.toThrow(
      `${path}:1: Expected 2 fields (question,answer), found 1`
    );
  });

  it('turns a missing file into an ImportFormatError without a line', async () => {
    const path = join(dir, 'missing.csv');

    const error = await readImportFile(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ImportFormatError);
    expect(error).toMatchObject({ source: path, line: undefined });
    expect(error instanceof Error && error.message.startsWith(`${path}: Cannot read file (`)).toBe(true);
  });
});
