import { body, param, query } from 'express-validator';

import { ORDER_CONFIG } from '../../config/environments';
import { OrderStatus } from '../../types/events';

export const createOrderValidation = [
  body('durationDays')
    .exists({ values: 'null' })
    .withMessage('durationDays is required')
    .isInt()
    .withMessage('durationDays must be an integer')
    .toInt(),
  body('channelIds')
    .isArray({ min: 1, max: ORDER_CONFIG.maxChannelsPerOrder })
    .withMessage(`channelIds must list between 1 and ${ORDER_CONFIG.maxChannelsPerOrder} channels`),
  body('channelIds.*')
    .isString()
    .withMessage('Each channel ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('Channel IDs cannot be empty')
    .isLength({ max: 128 })
    .withMessage('Channel IDs can be at most 128 characters'),
  body('claimedPayerAddress')
    .optional({ values: 'null' })
    .isString()
    .withMessage('claimedPayerAddress must be a string')
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('claimedPayerAddress must be between 1 and 128 characters'),
];

export const listOrdersValidation = [
  query('status')
    .optional()
    .isIn(Object.values(OrderStatus))
    .withMessage(`Status must be one of: ${Object.values(OrderStatus).join(', ')}`),
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100'),
  query('offset')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Offset must be a non-negative integer'),
];

export const orderIdValidation = [
  param('id')
    .notEmpty()
    .withMessage('Order ID is required')
    .isString()
    .withMessage('Order ID must be a string'),
];
