import { v4 as uuid } from 'uuid';

import { createServiceLogger, runWithContext } from '../../observability';
import { CampaignService, ResumeSummary } from '../campaign/campaign.service';

import { OrderService } from './order.service';

const log = createServiceLogger('sweeper');

export interface SweepResult {
  expired: number;
  resumed: ResumeSummary;
}

export interface MaintenanceSweeperDeps {
  orders: OrderService;
  campaigns: CampaignService;
  intervalMs: number;
}

/**
 * Periodic housekeeping: expire lapsed orders, then finish provisioning
 * and confirmations that an earlier failure left behind
 */
export class MaintenanceSweeper {
  private readonly orders: OrderService;
  private readonly campaigns: CampaignService;
  private readonly intervalMs: number;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SweepResult | null> | null = null;

  constructor(deps: MaintenanceSweeperDeps) {
    this.orders = deps.orders;
    this.campaigns = deps.campaigns;
    this.intervalMs = deps.intervalMs;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    log.info({ intervalMs: this.intervalMs }, 'Maintenance sweeper started');
    this.schedule();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info('Maintenance sweeper stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One sweep. Null when a sweep is already in flight or it failed.
   */
  async runOnce(): Promise<SweepResult | null> {
    if (this.inFlight) {
      return null;
    }

    const sweep = runWithContext({ correlationId: uuid() }, () => this.sweep());
    this.inFlight = sweep;
    try {
      return await sweep;
    } finally {
      this.inFlight = null;
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runOnce()
        .then(() => {
          if (this.running) {
            this.schedule();
          }
        })
        .catch((error: unknown) => {
          log.error({ error }, 'Sweeper tick failed');
        });
    }, this.intervalMs);
    this.timer.unref();
  }

  private async sweep(): Promise<SweepResult | null> {
    try {
      const expired = await this.orders.expireStale();
      const resumed = await this.campaigns.resumePending();
      if (expired > 0) {
        log.info({ expired }, 'Expired stale orders');
      }
      return { expired, resumed };
    } catch (error) {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Maintenance sweep failed'
      );
      return null;
    }
  }
}
