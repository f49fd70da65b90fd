import crypto from 'crypto';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const REFERENCE_CODE_PATTERN = /^[A-Z]{2}\d{4}$/;

const pick = (alphabet: string): string => alphabet[crypto.randomInt(alphabet.length)];

/**
 * Payment reference printed on an order and expected back as the transfer
 * memo: two letters followed by four digits, e.g. "AB0102".
 */
export function generateReferenceCode(): string {
  const digits = crypto.randomInt(10000).toString().padStart(4, '0');
  return `${pick(LETTERS)}${pick(LETTERS)}${digits}`;
}

/**
 * Memos arrive with arbitrary whitespace and casing
 */
export function normalizeReferenceCode(memo: string): string {
  return memo.trim().toUpperCase();
}

const prefixedId = (prefix: string): string =>
  `${prefix}_${crypto.randomUUID().replace(/-/g, '')}`;

export const generateOrderId = (): string => prefixedId('ord');
export const generatePostId = (): string => prefixedId('pst');
export const generateAuditId = (): string => prefixedId('aud');

/**
 * Campaign IDs read CAM-YYYY-MM-XXXX
 */
export function generateCampaignId(now: Date): string {
  const year = now.getUTCFullYear();
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const suffix = Array.from({ length: 4 }, () => pick(ALPHANUMERIC)).join('');
  return `CAM-${year}-${month}-${suffix}`;
}
