import { config } from '../config';

import { LedgerStore } from './ledger.store';
import { MemoryLedgerStore } from './memory.store';
import { MongoLedgerStore } from './mongo.store';

export * from './ledger.store';
export { DuplicateKeyError } from './errors';
export { MemoryLedgerStore } from './memory.store';
export { MongoLedgerStore } from './mongo.store';

export const createLedgerStore = (driver = config.storageDriver): LedgerStore =>
  driver === 'mongo' ? new MongoLedgerStore() : new MemoryLedgerStore();
