import {
  IncomingTransfer,
  LedgerFetchResult,
  LedgerPosition,
  LedgerSource,
  LedgerSourceError,
  RejectedRecord,
} from '../../src/services/payment';

let sequence = 0;

type Before = Pick<LedgerPosition, 'txId' | 'lt'>;

const positionOf = (t: IncomingTransfer): LedgerPosition => ({
  txId: t.txId,
  lt: `lt-${t.txId}`,
  occurredAt: t.occurredAt,
});

/**
 * In-process ledger: transfers are added by the test and served back for
 * any window that covers them, newest first up to the record budget
 */
export class FakeLedgerSource implements LedgerSource {
  readonly name = 'fake';
  readonly calls: { address: string; since: Date; before?: Before }[] = [];
  private readonly transfers: IncomingTransfer[] = [];
  private readonly pendingRejections: RejectedRecord[] = [];
  private readonly pendingFailures: Error[] = [];
  private recordBudget = Infinity;

  /** Records served per fetch; a larger window comes back truncated */
  limitRecords(budget: number): void {
    this.recordBudget = budget;
  }

  addTransfer(
    transfer: Pick<IncomingTransfer, 'toAddress' | 'amount' | 'memo' | 'occurredAt'> &
      Partial<IncomingTransfer>
  ): IncomingTransfer {
    sequence++;
    const added: IncomingTransfer = {
      txId: `tx-${sequence}`,
      fromAddress: 'EQ-test-payer',
      ...transfer,
    };
    this.transfers.push(added);
    return added;
  }

  /** The next fetch reports this record as malformed */
  rejectNext(record: RejectedRecord): void {
    this.pendingRejections.push(record);
  }

  /** The next fetch throws */
  failNext(error: Error = new LedgerSourceError('connect ETIMEDOUT')): void {
    this.pendingFailures.push(error);
  }

  async fetchTransfers(
    address: string,
    since: Date,
    before: Before | null = null
  ): Promise<LedgerFetchResult> {
    this.calls.push(
      before ? { address, since, before: { txId: before.txId, lt: before.lt } } : { address, since }
    );

    const failure = this.pendingFailures.shift();
    if (failure) {
      throw failure;
    }

    let window = this.transfers
      .filter((t) => t.toAddress === address && t.occurredAt.getTime() >= since.getTime())
      .sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime());
    if (before) {
      window = window.slice(window.findIndex((t) => t.txId === before.txId) + 1);
    }
    const served = window.slice(0, this.recordBudget);
    const newest = served[0];
    const oldest = served[served.length - 1];

    return {
      transfers: served.map((t) => ({ ...t })).reverse(),
      rejected: this.pendingRejections.splice(0),
      latest: newest ? { txId: newest.txId, occurredAt: newest.occurredAt } : null,
      oldest: oldest ? positionOf(oldest) : null,
      complete: served.length === window.length,
    };
  }
}
