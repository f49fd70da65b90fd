import { nanosToMicros } from '../../utils/amount';

import { IncomingTransfer } from './ledger.source';

/**
 * Shapes of the toncenter v2 `getTransactions` result, as far as we read it
 */
export interface TonCenterMessage {
  source?: string;
  destination?: string;
  value?: string | number;
  message?: string;
  msg_data?: {
    '@type'?: string;
    text?: string;
    body?: string;
  };
}

export interface TonCenterTransaction {
  utime: number;
  transaction_id: { lt: string; hash: string };
  in_msg?: TonCenterMessage | null;
}

export interface RecordHeader {
  txId: string;
  lt: string;
  occurredAt: Date;
}

export class TransferParseError extends Error {
  constructor(
    message: string,
    public readonly txId: string | null = null
  ) {
    super(message);
    this.name = 'TransferParseError';
  }
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

/**
 * Identity and timestamp of a raw record; enough to page through results
 * even when the record carries no transfer
 */
export function readRecordHeader(raw: unknown): RecordHeader {
  if (!isObject(raw)) {
    throw new TransferParseError('Transaction record is not an object');
  }
  const id = raw.transaction_id;
  if (!isObject(id) || typeof id.hash !== 'string' || !id.hash || typeof id.lt !== 'string') {
    throw new TransferParseError('Transaction record has no transaction_id');
  }
  const utime = raw.utime;
  if (typeof utime !== 'number' || !Number.isInteger(utime) || utime <= 0) {
    throw new TransferParseError('Transaction record has no valid utime', id.hash);
  }
  return { txId: id.hash, lt: id.lt, occurredAt: new Date(utime * 1000) };
}

const readNanos = (value: unknown, txId: string): string => {
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return String(value);
  }
  throw new TransferParseError(`Invalid value: ${String(value)}`, txId);
};

/**
 * Text comment of an inbound message: the decoded `message` field, or the
 * base64 text payload of a msg.dataText body
 */
export function extractMemo(message: Record<string, unknown>): string | null {
  const text = optionalString(message.message)?.trim();
  if (text) {
    return text;
  }

  const data = message.msg_data;
  if (isObject(data) && data['@type'] === 'msg.dataText' && typeof data.text === 'string') {
    const decoded = Buffer.from(data.text, 'base64').toString('utf8').trim();
    return decoded || null;
  }
  return null;
}

/**
 * Raw toncenter record -> transfer. Null for records that are not an
 * inbound value transfer (outgoing, external, zero value).
 */
export function parseTonCenterTransaction(raw: unknown): IncomingTransfer | null {
  const header = readRecordHeader(raw);
  if (!isObject(raw)) {
    return null;
  }

  const inMsg = raw.in_msg;
  if (inMsg === undefined || inMsg === null) {
    return null;
  }
  if (!isObject(inMsg)) {
    throw new TransferParseError('in_msg is not an object', header.txId);
  }

  const source = optionalString(inMsg.source);
  if (!source) {
    // External inbound message: no sender, no value
    return null;
  }

  const nanos = readNanos(inMsg.value, header.txId);
  const amount = nanosToMicros(nanos);
  if (amount === 0) {
    return null;
  }

  const destination = optionalString(inMsg.destination);
  if (!destination) {
    throw new TransferParseError('Inbound message has no destination', header.txId);
  }

  return {
    txId: header.txId,
    fromAddress: source,
    toAddress: destination,
    amount,
    memo: extractMemo(inMsg),
    occurredAt: header.occurredAt,
  };
}
