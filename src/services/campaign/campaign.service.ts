import { ApiError } from '../../middlewares/errorHandler';
import {
  campaignsProvisionedTotal,
  createServiceLogger,
  provisioningFailuresTotal,
  scheduledPostsTotal,
} from '../../observability';
import { DuplicateKeyError, LedgerStore } from '../../stores';
import { OrderStatus, PostStatus } from '../../types/events';
import { CampaignRecord, OrderRecord, ScheduledPostRecord } from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateCampaignId, generatePostId } from '../../utils/identifiers';
import { buildProvisionedEvent, NotificationPublisher } from '../notification/notification.types';
import { Requester } from '../order/order.service';
import { slotOffsetMinutes } from '../pricing/pricing.service';

const log = createServiceLogger('campaign');

const DAY_MS = 24 * 60 * 60 * 1000;
const CAMPAIGN_ID_ATTEMPTS = 3;

/**
 * Posts leave `scheduled` once, for either outcome
 */
const postTransitions: Record<PostStatus, PostStatus[]> = {
  [PostStatus.SCHEDULED]: [PostStatus.PUBLISHED, PostStatus.FAILED],
  [PostStatus.PUBLISHED]: [],
  [PostStatus.FAILED]: [],
};

export interface ProvisionResult {
  campaign: CampaignRecord;
  created: boolean;
}

export interface PostStatusUpdate {
  failureReason?: string | null;
  externalMessageId?: string | null;
}

export interface ResumeSummary {
  provisioned: number;
  confirmed: number;
  failed: number;
}

export interface CampaignServiceDeps {
  store: LedgerStore;
  notifier: NotificationPublisher;
  clock?: Clock;
  /** Rows scanned per resume pass */
  batchLimit?: number;
}

/**
 * Turns a matched order into a campaign with its full post schedule, and
 * emits the buyer confirmation exactly once per campaign.
 */
export class CampaignService {
  private readonly store: LedgerStore;
  private readonly notifier: NotificationPublisher;
  private readonly clock: Clock;
  private readonly batchLimit: number;

  constructor(deps: CampaignServiceDeps) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? systemClock;
    this.batchLimit = deps.batchLimit ?? 200;
  }

  /**
   * One post per (day, slot, channel), anchored at the order's match time
   */
  buildSchedule(order: OrderRecord, campaignId: string, matchedAt: Date): ScheduledPostRecord[] {
    const posts: ScheduledPostRecord[] = [];
    for (let dayIndex = 0; dayIndex < order.durationDays; dayIndex++) {
      for (const slotTime of order.scheduleTimes) {
        const timestamp =
          matchedAt.getTime() + dayIndex * DAY_MS + slotOffsetMinutes(slotTime) * 60_000;
        for (const channelId of order.channelIds) {
          posts.push({
            postId: generatePostId(),
            campaignId,
            channelId,
            dayIndex,
            slotTime,
            absoluteTimestamp: new Date(timestamp),
            status: PostStatus.SCHEDULED,
            statusChangedAt: null,
            failureReason: null,
            externalMessageId: null,
          });
        }
      }
    }
    return posts;
  }

  /**
   * Idempotent: an order that already has a campaign gets it back unchanged
   */
  async provision(order: OrderRecord): Promise<ProvisionResult> {
    if (order.status !== OrderStatus.MATCHED || !order.matchedAt) {
      throw ApiError.invalidTransition(
        `Order ${order.orderId} is ${order.status}; only matched orders can be provisioned`
      );
    }
    const matchedAt = order.matchedAt;

    const existing = await this.store.campaigns.findByOrderId(order.orderId);
    if (existing) {
      return { campaign: existing, created: false };
    }

    for (let attempt = 1; attempt <= CAMPAIGN_ID_ATTEMPTS; attempt++) {
      const now = this.clock();
      const campaignId = generateCampaignId(now);
      const posts = this.buildSchedule(order, campaignId, matchedAt);
      const campaign: CampaignRecord = {
        campaignId,
        orderId: order.orderId,
        userId: order.userId,
        channelIds: [...order.channelIds],
        durationDays: order.durationDays,
        postsPerDay: order.postsPerDay,
        slotTimes: [...order.scheduleTimes],
        totalPosts: posts.length,
        startsAt: matchedAt,
        createdAt: now,
        confirmationClaimedAt: null,
      };

      try {
        const result = await this.store.campaigns.create(campaign, posts);
        if (result.created) {
          campaignsProvisionedTotal.inc();
          log.info(
            { orderId: order.orderId, campaignId, totalPosts: posts.length },
            'Campaign provisioned'
          );
        }
        return result;
      } catch (error) {
        if (error instanceof DuplicateKeyError && error.key === 'campaignId') {
          log.warn({ campaignId, attempt }, 'Campaign ID collision');
          continue;
        }
        throw error;
      }
    }

    throw ApiError.internal('Could not allocate a campaign ID');
  }

  /**
   * Resolves to the campaign as stored after the confirmation claim
   */
  async provisionAndConfirm(order: OrderRecord): Promise<CampaignRecord> {
    const { campaign } = await this.provision(order);
    await this.confirm(campaign);
    return (await this.store.campaigns.findById(campaign.campaignId)) ?? campaign;
  }

  /**
   * Emit the confirmation if nobody has claimed it yet. Resolves to true
   * for the caller that emitted.
   */
  async confirm(campaign: CampaignRecord): Promise<boolean> {
    const claimedAt = this.clock();
    const claimed = await this.store.campaigns.claimConfirmation(campaign.campaignId, claimedAt);
    if (!claimed) {
      return false;
    }

    try {
      await this.notifier.emitConfirmation(buildProvisionedEvent(campaign, claimedAt));
    } catch (error) {
      // Hand the claim back so the sweeper retries the emit
      await this.store.campaigns.releaseConfirmation(campaign.campaignId, claimedAt);
      throw error;
    }

    log.info({ campaignId: campaign.campaignId }, 'Confirmation emitted');
    return true;
  }

  /**
   * Called by the external publisher once a post went out or failed
   */
  async updatePostStatus(
    postId: string,
    status: PostStatus,
    update: PostStatusUpdate = {}
  ): Promise<ScheduledPostRecord> {
    const post = await this.store.campaigns.findPost(postId);
    if (!post) {
      throw ApiError.notFound('Post');
    }
    if (!postTransitions[post.status].includes(status)) {
      throw ApiError.invalidTransition(`Post ${postId} cannot move from ${post.status} to ${status}`);
    }

    const updated = await this.store.campaigns.transitionPost(postId, {
      from: post.status,
      to: status,
      at: this.clock(),
      failureReason: status === PostStatus.FAILED ? update.failureReason ?? null : null,
      externalMessageId: update.externalMessageId ?? null,
    });
    if (!updated) {
      const current = await this.store.campaigns.findPost(postId);
      throw ApiError.invalidTransition(
        `Post ${postId} cannot move from ${current?.status ?? post.status} to ${status}`
      );
    }

    scheduledPostsTotal.inc({ status });
    log.info({ postId, campaignId: post.campaignId, status }, 'Post status updated');
    return updated;
  }

  async getCampaign(campaignId: string): Promise<CampaignRecord> {
    const campaign = await this.store.campaigns.findById(campaignId);
    if (!campaign) {
      throw ApiError.notFound('Campaign');
    }
    return campaign;
  }

  async getCampaignForUser(campaignId: string, requester: Requester): Promise<CampaignRecord> {
    const campaign = await this.getCampaign(campaignId);
    if (campaign.userId !== requester.userId && requester.role !== 'admin') {
      throw ApiError.forbidden('Not authorized to view this campaign');
    }
    return campaign;
  }

  async listPosts(campaignId: string): Promise<ScheduledPostRecord[]> {
    return this.store.campaigns.listPosts(campaignId);
  }

  async listDuePosts(before: Date, limit: number): Promise<ScheduledPostRecord[]> {
    return this.store.campaigns.findDuePosts(before, limit);
  }

  /**
   * Finish work a crash or failure left behind: matched orders without a
   * campaign, and campaigns whose confirmation was never claimed
   */
  async resumePending(): Promise<ResumeSummary> {
    const summary: ResumeSummary = { provisioned: 0, confirmed: 0, failed: 0 };

    const awaiting = await this.store.orders.findAwaitingProvision(this.batchLimit);
    for (const order of awaiting) {
      try {
        await this.provisionAndConfirm(order);
        summary.provisioned++;
      } catch (error) {
        summary.failed++;
        provisioningFailuresTotal.inc();
        log.error(
          { orderId: order.orderId, error: error instanceof Error ? error.message : String(error) },
          'Provisioning retry failed'
        );
      }
    }

    const unconfirmed = await this.store.campaigns.findUnconfirmed(this.batchLimit);
    for (const campaign of unconfirmed) {
      try {
        if (await this.confirm(campaign)) {
          summary.confirmed++;
        }
      } catch (error) {
        summary.failed++;
        log.error(
          {
            campaignId: campaign.campaignId,
            error: error instanceof Error ? error.message : String(error),
          },
          'Confirmation retry failed'
        );
      }
    }

    if (summary.provisioned || summary.confirmed || summary.failed) {
      log.info(summary, 'Resumed pending provisioning');
    }
    return summary;
  }
}
