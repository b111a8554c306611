/**
 * Base Repository Interface for Interval Drill
 *
 * Repositories hide Drizzle ORM and SQLite from the rest of the program.
 * The scheduler works on whole in-memory collections, so the interface is
 * shaped around loading everything once and writing back individual or
 * batched entities, rather than around field-level updates.
 */

/**
 * Generic repository interface for entities the program creates in memory
 * and then persists.
 *
 * @typeParam T - The domain model type stored by the repository
 *
 * @example
 * ```typescript
 * class DeckRepository implements Repository<Deck> {
 *   async findById(id: string): Promise<Deck | null> {
 *     // implementation
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Repository<T> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Retrieves all entities, in insertion order.
   */
  findAll(): Promise<T[]>;

  /**
   * Persists new entities atomically: either all are stored or none.
   */
  insertMany(entities: readonly T[]): Promise<void>;

  /**
   * Writes the current state of an existing entity.
   *
   * @throws Error if the entity has not been stored before
   */
  save(entity: T): Promise<void>;
}
