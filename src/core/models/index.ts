/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import { type Item, type ReviewOutcome, summarizeHistory } from '@/core/models';
 * ```
 */

export {
  DEFAULT_DECK,
  summarizeHistory,
  type Item,
  type ReviewOutcome,
  type ReviewRecord,
  type QuestionAnswerPair,
  type HistorySummary,
} from './item';
