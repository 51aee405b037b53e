import type { KeyMatch } from '../config/schema.js';

/**
 * Error thrown when a key or value cannot be stored as a single `key=value` line
 */
export class InvalidEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEntryError';
  }
}

export type EditResult = 'added' | 'updated';

export interface KeyMatchOptions {
  /** Defaults to `prefix` */
  match?: KeyMatch;
}
