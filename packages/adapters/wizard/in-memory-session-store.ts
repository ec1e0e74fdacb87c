/**
 * InMemorySessionStore
 *
 * Process-local session backend. Sessions are kept as serialized snapshots
 * so each request works on its own copy, exactly like a remote backend.
 * Used by tests and when no Redis URL is configured.
 */

import type { Logger } from 'pino';
import type { ISessionStore, ISessionStoreFactory } from '@stepwise/core/ports';
import {
  SessionAttributes,
  deserializeAttributes,
  serializeAttributes,
} from './session-attributes.js';

// =============================================================================
// Session Store
// =============================================================================

export class InMemorySessionStore extends SessionAttributes {
  constructor(
    id: string,
    private readonly snapshots: Map<string, string> = new Map(),
    attributes: Record<string, unknown> = {}
  ) {
    super(id, attributes);
  }

  async save(): Promise<void> {
    this.snapshots.set(this.id, serializeAttributes(this.attributes));
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Options for creating InMemorySessionStoreFactory.
 */
export interface InMemorySessionStoreOptions {
  /** Logger instance */
  logger: Logger;
}

export class InMemorySessionStoreFactory implements ISessionStoreFactory {
  private readonly snapshots = new Map<string, string>();
  private readonly log: Logger;

  constructor(options: InMemorySessionStoreOptions) {
    this.log = options.logger.child({ component: 'InMemorySessionStoreFactory' });
  }

  async open(sessionId: string): Promise<ISessionStore> {
    const snapshot = this.snapshots.get(sessionId);
    const attributes = snapshot === undefined ? {} : deserializeAttributes(snapshot);
    if (attributes === null) {
      this.log.warn({ sessionId }, 'Discarding unreadable session snapshot');
    }
    return new InMemorySessionStore(sessionId, this.snapshots, attributes ?? {});
  }

  async destroy(sessionId: string): Promise<boolean> {
    return this.snapshots.delete(sessionId);
  }

  async close(): Promise<void> {
    this.snapshots.clear();
    this.log.info('In-memory session store closed');
  }

  /**
   * Number of stored sessions.
   */
  get size(): number {
    return this.snapshots.size;
  }
}
