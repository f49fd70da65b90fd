import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { requireRole } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';

import { CampaignController } from './campaign.controller';
import {
  campaignIdValidation,
  duePostsValidation,
  updatePostStatusValidation,
} from './campaign.validation';

export const createCampaignRoutes = (
  controller: CampaignController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  router.use(authenticate);

  // GET /campaigns/posts/due - Posts the publisher should send
  router.get(
    '/posts/due',
    requireRole('publisher'),
    duePostsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listDuePosts(req, res, next)
  );

  // PATCH /campaigns/posts/:postId - Report a post as published or failed
  router.patch(
    '/posts/:postId',
    requireRole('publisher'),
    updatePostStatusValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.updatePostStatus(req, res, next)
  );

  // GET /campaigns/:id - Campaign details (owner or admin)
  router.get(
    '/:id',
    campaignIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getCampaign(req, res, next)
  );

  // GET /campaigns/:id/posts - Full post schedule (owner or admin)
  router.get(
    '/:id/posts',
    campaignIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listPosts(req, res, next)
  );

  return router;
};
