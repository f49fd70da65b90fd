import { PageOptions } from '../stores/ledger.store';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

/**
 * Read an integer query/body value that express-validator may or may not
 * have already converted
 */
export const toInteger = (value: unknown, fallback: number): number => {
  const parsed =
    typeof value === 'number' ? value : typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
};

export const toEnumValue = <T extends string>(values: readonly T[], value: unknown): T | undefined =>
  values.find((candidate) => candidate === value);

export const toPageOptions = (query: { limit?: unknown; offset?: unknown }): PageOptions => ({
  limit: Math.min(Math.max(toInteger(query.limit, DEFAULT_LIMIT), 1), MAX_LIMIT),
  offset: Math.max(toInteger(query.offset, 0), 0),
});
