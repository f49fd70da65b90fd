import { body, param, query } from 'express-validator';

import { PostStatus } from '../../types/events';

const FINAL_POST_STATUSES = [PostStatus.PUBLISHED, PostStatus.FAILED];

export const campaignIdValidation = [
  param('id')
    .matches(/^CAM-\d{4}-\d{2}-[A-Z0-9]{4}$/)
    .withMessage('Campaign ID must look like CAM-YYYY-MM-XXXX'),
];

export const duePostsValidation = [
  query('before')
    .optional()
    .isISO8601()
    .withMessage('before must be an ISO 8601 timestamp'),
  query('limit')
    .optional()
    .isInt({ min: 1, max: 500 })
    .withMessage('Limit must be between 1 and 500'),
];

export const updatePostStatusValidation = [
  param('postId')
    .notEmpty()
    .withMessage('Post ID is required'),
  body('status')
    .isIn(FINAL_POST_STATUSES)
    .withMessage(`Status must be one of: ${FINAL_POST_STATUSES.join(', ')}`),
  body('failureReason')
    .optional({ values: 'null' })
    .isString()
    .withMessage('failureReason must be a string')
    .isLength({ max: 500 })
    .withMessage('failureReason can be at most 500 characters'),
  body('externalMessageId')
    .optional({ values: 'null' })
    .isString()
    .withMessage('externalMessageId must be a string')
    .isLength({ max: 128 })
    .withMessage('externalMessageId can be at most 128 characters'),
];
