/**
 * Ledger API Validation Rules
 */

import { query } from 'express-validator';

import { TransactionStatus, TransactionType } from '../../types/ledger';

export const transactionListValidation = [
  query('type')
    .optional()
    .isIn(Object.values(TransactionType))
    .withMessage(`type must be one of ${Object.values(TransactionType).join(', ')}`),

  query('status')
    .optional()
    .isIn(Object.values(TransactionStatus))
    .withMessage(`status must be one of ${Object.values(TransactionStatus).join(', ')}`),

  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100'),

  query('offset')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Offset must be a non-negative integer'),
];
