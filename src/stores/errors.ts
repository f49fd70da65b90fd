/**
 * Raised by a store when a unique constraint rejects a write
 */
export class DuplicateKeyError extends Error {
  constructor(public readonly key: string) {
    super(`Duplicate value for ${key}`);
    this.name = 'DuplicateKeyError';
  }
}
