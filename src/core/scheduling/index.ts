/**
 * Scheduling Module - Barrel Export
 *
 * Exports:
 * - IntervalTable: immutable spacing sequence with bounds-checked lookup
 * - Scheduler: due selection and the advance/reset review transition
 * - computeIntervalHours: the growth curve behind configurable tables
 *
 * @example
 * ```typescript
 * import { IntervalTable, Scheduler } from '@/core/scheduling';
 *
 * const scheduler = new Scheduler(IntervalTable.fromGrowth({ hours: 720 }));
 * const [item] = scheduler.addItems([{ question: '2+2', answer: '4' }]);
 * scheduler.review(item, 'correct', new Date());
 * ```
 */

export {
  IntervalTable,
  computeIntervalHours,
  DEFAULT_INTERVAL_HOURS,
  DEFAULT_GROWTH_PARAMS,
  MS_PER_HOUR,
  type IntervalGrowthParams,
} from './interval-table';

export { Scheduler, type AddItemsOptions } from './scheduler';
