import { query } from 'express-validator';

// Ranges are enforced by PricingService so callers get INVALID_DURATION / INVALID_CHANNELS
export const quoteValidation = [
  query('durationDays')
    .notEmpty()
    .withMessage('durationDays is required')
    .isInt()
    .withMessage('durationDays must be an integer')
    .toInt(),
  query('channelCount')
    .notEmpty()
    .withMessage('channelCount is required')
    .isInt()
    .withMessage('channelCount must be an integer')
    .toInt(),
];
