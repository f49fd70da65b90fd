/**
 * An inbound value transfer to one of our receiving addresses.
 * Amounts are micro-units.
 */
export interface IncomingTransfer {
  txId: string;
  fromAddress: string | null;
  toAddress: string;
  amount: number;
  memo: string | null;
  occurredAt: Date;
}

export interface RejectedRecord {
  txId: string | null;
  error: string;
}

/**
 * A record's place in the ledger, enough to page from it
 */
export interface LedgerPosition {
  txId: string;
  lt: string;
  occurredAt: Date;
}

export interface LedgerFetchResult {
  /** Oldest first */
  transfers: IncomingTransfer[];
  /** Records that could not be parsed */
  rejected: RejectedRecord[];
  /** Newest record seen in the window, inbound or not */
  latest: { txId: string; occurredAt: Date } | null;
  /** Oldest record seen in the window */
  oldest: LedgerPosition | null;
  /**
   * False when paging stopped before the window start; records between
   * `since` and `oldest` were not read
   */
  complete: boolean;
}

/**
 * Read side of an external ledger
 */
export interface LedgerSource {
  readonly name: string;
  /**
   * Records from `since` up to the head, or up to (not including)
   * `before` when given
   */
  fetchTransfers(
    address: string,
    since: Date,
    before?: Pick<LedgerPosition, 'txId' | 'lt'> | null
  ): Promise<LedgerFetchResult>;
}

/**
 * Network failure, timeout or an error reply from the ledger API
 */
export class LedgerSourceError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'LedgerSourceError';
  }
}
