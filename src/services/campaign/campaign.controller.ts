import { Response, NextFunction } from 'express';

import { getAuthUser } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { PostStatus } from '../../types/events';
import { CampaignRecord, ScheduledPostRecord } from '../../types/ledger';
import { toEnumValue, toInteger } from '../../utils/query';

import { CampaignService } from './campaign.service';

interface UpdatePostBody {
  status: string;
  failureReason?: string | null;
  externalMessageId?: string | null;
}

const POST_STATUSES = Object.values(PostStatus);
const DUE_POSTS_DEFAULT_LIMIT = 100;

export const toCampaignDTO = (campaign: CampaignRecord) => ({
  campaignId: campaign.campaignId,
  orderId: campaign.orderId,
  channelIds: campaign.channelIds,
  durationDays: campaign.durationDays,
  postsPerDay: campaign.postsPerDay,
  slotTimes: campaign.slotTimes,
  totalPosts: campaign.totalPosts,
  startsAt: campaign.startsAt,
  createdAt: campaign.createdAt,
  confirmed: campaign.confirmationClaimedAt !== null,
});

export const toPostDTO = (post: ScheduledPostRecord) => ({
  postId: post.postId,
  campaignId: post.campaignId,
  channelId: post.channelId,
  dayIndex: post.dayIndex,
  slotTime: post.slotTime,
  scheduledAt: post.absoluteTimestamp,
  status: post.status,
  statusChangedAt: post.statusChangedAt,
  failureReason: post.failureReason,
  externalMessageId: post.externalMessageId,
});

export class CampaignController {
  constructor(private readonly campaigns: CampaignService) {}

  /**
   * GET /campaigns/:id
   */
  async getCampaign(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const campaign = await this.campaigns.getCampaignForUser(req.params.id, user);

      res.status(200).json({
        success: true,
        data: { campaign: toCampaignDTO(campaign) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /campaigns/:id/posts
   */
  async listPosts(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const campaign = await this.campaigns.getCampaignForUser(req.params.id, user);
      const posts = await this.campaigns.listPosts(campaign.campaignId);

      res.status(200).json({
        success: true,
        data: {
          campaignId: campaign.campaignId,
          posts: posts.map(toPostDTO),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Scheduled posts due by `before` (default: now), for the publisher
   * GET /campaigns/posts/due
   */
  async listDuePosts(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const before = typeof req.query.before === 'string' ? new Date(req.query.before) : new Date();
      const limit = toInteger(req.query.limit, DUE_POSTS_DEFAULT_LIMIT);
      const posts = await this.campaigns.listDuePosts(before, limit);

      res.status(200).json({
        success: true,
        data: { before, posts: posts.map(toPostDTO) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Publisher reports the outcome of a post
   * PATCH /campaigns/posts/:postId
   */
  async updatePostStatus(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const input: UpdatePostBody = req.body;
      const status = toEnumValue(POST_STATUSES, input.status);
      if (!status) {
        throw ApiError.validationError('Invalid post status');
      }

      const post = await this.campaigns.updatePostStatus(req.params.postId, status, {
        failureReason: input.failureReason,
        externalMessageId: input.externalMessageId,
      });

      res.status(200).json({
        success: true,
        data: { post: toPostDTO(post) },
      });
    } catch (error) {
      next(error);
    }
  }
}
