import { v4 as uuid } from 'uuid';

import { POLLER_CONFIG } from '../../config/environments';
import {
  createServiceLogger,
  pollerConsecutiveFailures,
  pollerCycleDuration,
  pollerCyclesTotal,
  runWithContext,
} from '../../observability';
import { LedgerStore } from '../../stores';
import { PollerCursor } from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { ReconciliationService, ReconciliationSummary } from '../reconciliation';

import { LedgerFetchResult, LedgerSource } from './ledger.source';

const log = createServiceLogger('payment-poller');

export type PollerConfig = typeof POLLER_CONFIG;

export interface PollCycleResult {
  status: 'success' | 'failure' | 'skipped';
  fetched: number;
  recorded: number;
  rejected: number;
  cursorAdvanced: boolean;
  /** The window was cut short; the next cycle reads the gap below it */
  backfilling: boolean;
  summary: ReconciliationSummary | null;
  error?: string;
}

export interface PollerStatus {
  address: string;
  source: string;
  running: boolean;
  consecutiveFailures: number;
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
  lastError: string | null;
}

export interface PaymentPollerDeps {
  address: string;
  source: LedgerSource;
  store: LedgerStore;
  reconciliation: ReconciliationService;
  config?: PollerConfig;
  clock?: Clock;
}

const idle = (status: PollCycleResult['status']): PollCycleResult => ({
  status,
  fetched: 0,
  recorded: 0,
  rejected: 0,
  cursorAdvanced: false,
  backfilling: false,
  summary: null,
});

/**
 * Watches one receiving address: pulls new transfers from the ledger
 * source, records them, and hands unprocessed ones to reconciliation.
 *
 * Cycles never overlap; the next one is armed only after the previous one
 * finished, with exponential backoff after failures.
 */
export class PaymentPoller {
  readonly address: string;
  private readonly source: LedgerSource;
  private readonly store: LedgerStore;
  private readonly reconciliation: ReconciliationService;
  private readonly config: PollerConfig;
  private readonly clock: Clock;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollCycleResult> | null = null;
  private consecutiveFailures = 0;
  private lastSuccessAt: Date | null = null;
  private lastFailureAt: Date | null = null;
  private lastError: string | null = null;

  constructor(deps: PaymentPollerDeps) {
    this.address = deps.address;
    this.source = deps.source;
    this.store = deps.store;
    this.reconciliation = deps.reconciliation;
    this.config = deps.config ?? POLLER_CONFIG;
    this.clock = deps.clock ?? systemClock;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    log.info(
      { address: this.address, source: this.source.name, intervalMs: this.config.intervalMs },
      'Payment poller started'
    );
    this.schedule(0);
  }

  /**
   * Stop arming new cycles and wait for the one in flight
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info({ address: this.address }, 'Payment poller stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): PollerStatus {
    return {
      address: this.address,
      source: this.source.name,
      running: this.running,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError,
    };
  }

  /**
   * Delay before the next cycle: the interval, doubled per consecutive
   * failure, capped at the maximum backoff
   */
  nextDelayMs(): number {
    const delay = this.config.intervalMs * 2 ** this.consecutiveFailures;
    return Math.min(delay, this.config.maxBackoffMs);
  }

  /**
   * Run one cycle now. A call made while a cycle is in flight resolves to
   * a skipped result without touching the source.
   */
  async runCycle(): Promise<PollCycleResult> {
    if (this.inFlight) {
      return idle('skipped');
    }

    const cycle = runWithContext({ correlationId: uuid(), address: this.address }, () =>
      this.poll()
    );
    this.inFlight = cycle;
    try {
      return await cycle;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * The cursor moves only past records that were read and handed off. A
   * rejected record holds it; a truncated window leaves a backfill point
   * and the cursor moves to the head once the gap below it has been read.
   * Resolves to true when `lastTimestamp` moved forward.
   */
  private async saveCursor(
    cursor: PollerCursor | null,
    since: Date,
    fetched: LedgerFetchResult,
    now: Date
  ): Promise<boolean> {
    const clean = fetched.rejected.length === 0;
    const backfill = cursor?.backfill ?? null;

    if (!fetched.complete) {
      const oldest = fetched.oldest;
      if (!oldest) {
        return false;
      }
      // Keep the head from the cycle that opened the gap
      const head = backfill
        ? backfill.headTxId && backfill.headTimestamp
          ? { txId: backfill.headTxId, occurredAt: backfill.headTimestamp }
          : null
        : fetched.latest;
      const keepHead = clean && head !== null;
      await this.store.cursors.save({
        address: this.address,
        lastTimestamp: cursor?.lastTimestamp ?? since,
        lastTxId: cursor?.lastTxId ?? null,
        backfill: {
          txId: oldest.txId,
          lt: oldest.lt,
          headTxId: keepHead ? head.txId : null,
          headTimestamp: keepHead ? head.occurredAt : null,
        },
        updatedAt: now,
      });
      log.warn(
        { address: this.address, since, resumeBelow: oldest.txId, at: oldest.occurredAt },
        'Window truncated; reading the gap next cycle'
      );
      return false;
    }

    let target: { txId: string; occurredAt: Date } | null = null;
    if (backfill) {
      if (clean && backfill.headTxId && backfill.headTimestamp) {
        target = { txId: backfill.headTxId, occurredAt: backfill.headTimestamp };
      }
    } else if (clean) {
      target = fetched.latest;
    }

    if (!target) {
      if (cursor && backfill) {
        await this.store.cursors.save({ ...cursor, backfill: null, updatedAt: now });
      }
      return false;
    }

    const behind = cursor !== null && target.occurredAt.getTime() < cursor.lastTimestamp.getTime();
    await this.store.cursors.save(
      cursor && behind
        ? { ...cursor, backfill: null, updatedAt: now }
        : {
            address: this.address,
            lastTimestamp: target.occurredAt,
            lastTxId: target.txId,
            backfill: null,
            updatedAt: now,
          }
    );
    return !behind;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((error: unknown) => {
        log.error({ address: this.address, error }, 'Poller tick failed');
      });
    }, delayMs);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    await this.runCycle();
    if (this.running) {
      this.schedule(this.nextDelayMs());
    }
  }

  private async poll(): Promise<PollCycleResult> {
    const endTimer = pollerCycleDuration.startTimer();
    const now = this.clock();

    try {
      const cursor = await this.store.cursors.get(this.address);
      const since = cursor
        ? new Date(cursor.lastTimestamp.getTime() - this.config.lookbackSeconds * 1000)
        : new Date(now.getTime() - this.config.initialLookbackSeconds * 1000);

      const backfill = cursor?.backfill ?? null;
      const fetched = await this.source.fetchTransfers(this.address, since, backfill);

      let recorded = 0;
      for (const transfer of fetched.transfers) {
        const { inserted } = await this.store.transactions.record(
          {
            txId: transfer.txId,
            receivingAddress: this.address,
            fromAddress: transfer.fromAddress,
            toAddress: transfer.toAddress,
            amount: transfer.amount,
            memo: transfer.memo,
            occurredAt: transfer.occurredAt,
          },
          now
        );
        if (inserted) {
          recorded++;
        }
      }

      const unprocessed = await this.store.transactions.findUnprocessed(
        this.address,
        this.config.batchLimit
      );
      const summary = await this.reconciliation.reconcile(unprocessed);

      const cursorAdvanced = await this.saveCursor(cursor, since, fetched, now);

      this.consecutiveFailures = 0;
      this.lastSuccessAt = now;
      this.lastError = null;
      pollerCyclesTotal.inc({ status: 'success' });
      pollerConsecutiveFailures.set({ address: this.address }, 0);

      const result: PollCycleResult = {
        status: 'success',
        fetched: fetched.transfers.length,
        recorded,
        rejected: fetched.rejected.length,
        cursorAdvanced,
        backfilling: !fetched.complete,
        summary,
      };
      if (recorded > 0 || unprocessed.length > 0 || result.rejected > 0) {
        log.info({ address: this.address, ...result }, 'Poll cycle completed');
      } else {
        log.debug({ address: this.address }, 'Poll cycle completed with nothing new');
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.consecutiveFailures++;
      this.lastFailureAt = now;
      this.lastError = message;
      pollerCyclesTotal.inc({ status: 'failure' });
      pollerConsecutiveFailures.set({ address: this.address }, this.consecutiveFailures);

      log.error(
        {
          address: this.address,
          error: message,
          consecutiveFailures: this.consecutiveFailures,
          nextDelayMs: this.nextDelayMs(),
        },
        'Poll cycle failed'
      );
      return { ...idle('failure'), error: message };
    } finally {
      endTimer();
    }
  }
}
