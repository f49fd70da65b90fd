import {
  extractMemo,
  parseTonCenterTransaction,
  readRecordHeader,
  TransferParseError,
} from '../../../src/services/payment';

const record = (inMsg: Record<string, unknown> | null, overrides: Record<string, unknown> = {}) => ({
  utime: 1_772_359_200,
  transaction_id: { lt: '4100', hash: 'hash-1' },
  in_msg: inMsg,
  ...overrides,
});

const inbound = (overrides: Record<string, unknown> = {}) => ({
  source: 'EQ-payer',
  destination: 'EQ-receiver',
  value: '11497920000',
  message: 'AB1234',
  ...overrides,
});

describe('transfer parser', () => {
  describe('readRecordHeader', () => {
    it('should read the hash, logical time and timestamp', () => {
      expect(readRecordHeader(record(null))).toEqual({
        txId: 'hash-1',
        lt: '4100',
        occurredAt: new Date('2026-03-01T10:00:00.000Z'),
      });
    });

    it('should reject a non-object record', () => {
      expect(() => readRecordHeader('nope')).toThrow('Transaction record is not an object');
    });

    it('should reject a record without a transaction id', () => {
      expect(() => readRecordHeader({ utime: 1 })).toThrow(
        'Transaction record has no transaction_id'
      );
    });

    it('should reject a bad timestamp and keep the tx id', () => {
      try {
        readRecordHeader(record(null, { utime: 'soon' }));
        throw new Error('expected a parse error');
      } catch (error) {
        expect(error).toBeInstanceOf(TransferParseError);
        if (error instanceof TransferParseError) {
          expect(error.message).toBe('Transaction record has no valid utime');
          expect(error.txId).toBe('hash-1');
        }
      }
    });
  });

  describe('parseTonCenterTransaction', () => {
    it('should convert an inbound message to a transfer in micro-units', () => {
      expect(parseTonCenterTransaction(record(inbound()))).toEqual({
        txId: 'hash-1',
        fromAddress: 'EQ-payer',
        toAddress: 'EQ-receiver',
        amount: 11_497_920,
        memo: 'AB1234',
        occurredAt: new Date('2026-03-01T10:00:00.000Z'),
      });
    });

    it('should accept a numeric value', () => {
      const transfer = parseTonCenterTransaction(record(inbound({ value: 290000000 })));

      expect(transfer?.amount).toBe(290000);
    });

    it('should return null for outgoing-only records', () => {
      expect(parseTonCenterTransaction(record(null))).toBeNull();
    });

    it('should return null for external messages without a source', () => {
      expect(parseTonCenterTransaction(record(inbound({ source: '' })))).toBeNull();
    });

    it('should return null below one micro-unit', () => {
      expect(parseTonCenterTransaction(record(inbound({ value: '999' })))).toBeNull();
    });

    it('should reject an unparseable value', () => {
      expect(() => parseTonCenterTransaction(record(inbound({ value: '1.5' })))).toThrow(
        'Invalid value: 1.5'
      );
    });

    it('should reject an inbound message without a destination', () => {
      expect(() =>
        parseTonCenterTransaction(record(inbound({ destination: undefined })))
      ).toThrow('Inbound message has no destination');
    });
  });

  describe('extractMemo', () => {
    it('should trim the decoded comment', () => {
      expect(extractMemo({ message: '  ab1234 \n' })).toBe('ab1234');
    });

    it('should fall back to a base64 text body', () => {
      const text = Buffer.from(' CD5678 ', 'utf8').toString('base64');

      expect(extractMemo({ message: '', msg_data: { '@type': 'msg.dataText', text } })).toBe(
        'CD5678'
      );
    });

    it('should ignore raw binary bodies', () => {
      expect(extractMemo({ msg_data: { '@type': 'msg.dataRaw', body: 'te6cck' } })).toBeNull();
    });

    it('should return null for an empty comment', () => {
      expect(extractMemo({ message: '   ' })).toBeNull();
    });
  });
});
