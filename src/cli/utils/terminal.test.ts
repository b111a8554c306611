/**
 * Terminal Formatter Tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  bold,
  formatDateTime,
  formatHours,
  formatItemStatus,
  green,
} from './terminal';
import type { ReviewOutcome } from '../../core/models';

function historyOf(...outcomes: ReviewOutcome[]) {
  return {
    history: outcomes.map((outcome, i) => ({ reviewedAt: new Date(i * 1000), outcome })),
  };
}

describe('color helpers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('wraps text in ANSI codes', () => {
    vi.stubEnv('NO_COLOR', '');
    expect(green('ok')).toBe('\x1b[32mok\x1b[0m');
    expect(bold('ok')).toBe('\x1b[1mok\x1b[0m');
  });

  it('returns plain text when NO_COLOR is set', () => {
    vi.stubEnv('NO_COLOR', '1');
    expect(green('ok')).toBe('ok');
  });
});

describe('formatItemStatus', () => {
  it('shows an empty history', () => {
    expect(formatItemStatus(historyOf())).toBe('0/0 -----');
  });

  it('lists recent outcomes newest first', () => {
    expect(formatItemStatus(historyOf('correct', 'incorrect', 'correct'))).toBe('2/3 oxo--');
    expect(formatItemStatus(historyOf('incorrect', 'correct'))).toBe('1/2 ox---');
  });

  it('keeps only the last five outcomes but counts all of them', () => {
    const status = formatItemStatus(
      historyOf('correct', 'correct', 'incorrect', 'incorrect', 'correct', 'correct', 'incorrect')
    );
    expect(status).toBe('4/7 xooxx');
  });
});

describe('formatHours', () => {
  it('uses hours below a day and days from there on', () => {
    expect(formatHours(0)).toBe('0h');
    expect(formatHours(13)).toBe('13h');
    expect(formatHours(24)).toBe('1d');
    expect(formatHours(99)).toBe('4.1d');
    expect(formatHours(2160)).toBe('90d');
  });
});

describe('formatDateTime', () => {
  it('formats local time with zero padding', () => {
    expect(formatDateTime(new Date(2024, 0, 5, 7, 3))).toBe('2024-01-05 07:03');
    expect(formatDateTime(new Date(2024, 11, 31, 23, 59))).toBe('2024-12-31 23:59');
  });
});
