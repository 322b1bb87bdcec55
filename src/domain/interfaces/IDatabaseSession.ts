/**
 * Database Session — Request-Scoped Connector Cache
 * Layer: Domain
 *
 * One session lives for exactly one inbound request. It hands out at most one
 * connector per database target, creating it on first use, and `close()`
 * returns every borrowed connection to its pool at the end of the request.
 */
import type { IDatabaseConnector } from './IDatabaseConnector';

export interface IDatabaseSession {
  /** Connector for the primary database; rejects with ConnectionError if it cannot connect. */
  primary(): Promise<IDatabaseConnector>;

  /** Connector for the secondary database, or null when none is configured. */
  secondary(): Promise<IDatabaseConnector | null>;

  /** Releases every connector opened by this session. Never rejects. */
  close(): Promise<void>;
}
