/**
 * @vouch/core - Transport Types
 */

import type { LogEntry } from "../logger.js";

/**
 * Log transport interface
 * Implement this to send entries somewhere other than the console
 */
export interface LogTransport {
  /** Transport name for identification */
  readonly name: string;

  /**
   * Log an entry.
   * Async transports buffer on their own; a rejected promise is reported, never thrown.
   */
  log(entry: LogEntry): void | Promise<void>;

  /**
   * Flush any buffered logs. Called on graceful shutdown.
   */
  flush?(): Promise<void>;
}
