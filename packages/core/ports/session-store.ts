/**
 * ISessionStore Interface
 *
 * Port for the external session backend: a key-value bag with durable,
 * per-user scope. Keys use dot notation (`namespace.field`) to address
 * nested values.
 *
 * Reads and writes operate on the session loaded for the current request;
 * `save()` flushes the whole bag to durable storage. There is no
 * cross-request transaction: concurrent requests against one session are
 * last-write-wins.
 */

// =============================================================================
// Session Store
// =============================================================================

export interface ISessionStore {
  /** Session identifier */
  readonly id: string;

  /**
   * Read a value by dot-notation key.
   *
   * @param key - Key such as `multistep-form.form_step`
   * @param fallback - Returned when the key is absent
   */
  get(key: string, fallback?: unknown): unknown;

  /**
   * Write a value by dot-notation key. Intermediate objects are created.
   */
  put(key: string, value: unknown): void;

  /**
   * Increment a numeric value (absent counts as 0).
   *
   * @returns The new value
   */
  increment(key: string, amount?: number): number;

  /**
   * Remove a key.
   */
  forget(key: string): void;

  /**
   * Snapshot of every attribute in the session.
   */
  all(): Record<string, unknown>;

  /**
   * Flush the session to durable storage.
   */
  save(): Promise<void>;
}

// =============================================================================
// Session Store Factory
// =============================================================================

/**
 * Opens the session bag for a session id at the start of a request.
 */
export interface ISessionStoreFactory {
  /**
   * Load (or start) the session with this id.
   */
  open(sessionId: string): Promise<ISessionStore>;

  /**
   * Delete a session entirely.
   *
   * @returns True if a session was deleted
   */
  destroy(sessionId: string): Promise<boolean>;

  /**
   * Release backend resources.
   */
  close(): Promise<void>;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Default session TTL in seconds (2 hours).
 */
export const DEFAULT_SESSION_TTL_SECONDS = 2 * 60 * 60;

/**
 * Maximum session TTL in seconds (7 days).
 */
export const MAX_SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

/**
 * Key prefix for persisted sessions: stepwise:session:{id}
 */
export const SESSION_KEY_PREFIX = 'stepwise:session:';
