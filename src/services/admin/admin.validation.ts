import { body, param, query } from 'express-validator';

import { TransactionOutcome, TransactionResolution } from '../../types/events';

const MANUAL_RESOLUTIONS = [TransactionResolution.REFUNDED, TransactionResolution.DISMISSED];

export const listTransactionsValidation = [
  query('outcome')
    .optional()
    .isIn(Object.values(TransactionOutcome))
    .withMessage(`Outcome must be one of: ${Object.values(TransactionOutcome).join(', ')}`),
  query('unresolvedOnly')
    .optional()
    .isBoolean()
    .withMessage('unresolvedOnly must be true or false'),
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100'),
  query('offset')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Offset must be a non-negative integer'),
];

export const forceMatchValidation = [
  param('txId').notEmpty().withMessage('Transaction ID is required'),
  body('orderId')
    .isString()
    .withMessage('orderId must be a string')
    .trim()
    .notEmpty()
    .withMessage('orderId is required'),
  body('reason')
    .isString()
    .withMessage('reason must be a string')
    .trim()
    .isLength({ min: 3, max: 500 })
    .withMessage('reason must be between 3 and 500 characters'),
];

export const resolveTransactionValidation = [
  param('txId').notEmpty().withMessage('Transaction ID is required'),
  body('resolution')
    .isIn(MANUAL_RESOLUTIONS)
    .withMessage(`resolution must be one of: ${MANUAL_RESOLUTIONS.join(', ')}`),
  body('note')
    .isString()
    .withMessage('note must be a string')
    .trim()
    .isLength({ min: 3, max: 500 })
    .withMessage('note must be between 3 and 500 characters'),
];

export const retryProvisioningValidation = [
  param('id').notEmpty().withMessage('Order ID is required'),
];

export const listAuditValidation = [
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100'),
  query('offset')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Offset must be a non-negative integer'),
];
