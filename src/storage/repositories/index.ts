/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { ItemRepository } from '@/storage/repositories';
 *
 * const itemRepo = new ItemRepository(db);
 * ```
 */

// Base repository interface
export type { Repository } from './base';

// Item repository and types
export {
  ItemRepository,
  type FindItemsOptions,
  type DeckSummary,
} from './item.repository';
