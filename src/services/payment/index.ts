export {
  IncomingTransfer,
  LedgerFetchResult,
  LedgerPosition,
  LedgerSource,
  LedgerSourceError,
  RejectedRecord,
} from './ledger.source';
export {
  extractMemo,
  parseTonCenterTransaction,
  readRecordHeader,
  TonCenterMessage,
  TonCenterTransaction,
  TransferParseError,
} from './transfer.parser';
export { TonCenterLedgerSource, TonCenterOptions } from './toncenter.source';
export {
  PaymentPoller,
  PaymentPollerDeps,
  PollCycleResult,
  PollerConfig,
  PollerStatus,
} from './payment.poller';
