/**
 * Session Module - Barrel Export
 */

export { ReviewSession } from './review-session';

export type {
  ReviewDecision,
  ReviewPresenter,
  ReviewedItemStore,
  ReviewSessionDependencies,
  SessionSummary,
} from './types';
