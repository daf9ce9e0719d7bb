import { body, param } from 'express-validator';

import { usdToCents } from '../../utils/money';

const isUsdAmount = (value: unknown): boolean =>
  (typeof value === 'number' || typeof value === 'string') && usdToCents(value) !== null;

export const redeemValidation = [
  body('code')
    .isString()
    .withMessage('Voucher code is required')
    .trim()
    .notEmpty()
    .withMessage('Voucher code is required')
    .isLength({ max: 40 })
    .withMessage('Voucher code is too long'),
];

const amountRules = [
  body('cidAmount')
    .optional()
    .isInt({ min: 0 })
    .withMessage('cidAmount must be a non-negative integer'),

  body('usd')
    .optional()
    .custom(isUsdAmount)
    .withMessage('usd must be a non-negative amount with at most 2 decimal places'),

  body('expiresInDays')
    .optional()
    .isInt({ min: 1, max: 3650 })
    .withMessage('expiresInDays must be between 1 and 3650'),
];

export const createVoucherValidation = [
  ...amountRules,
  body('code').optional().isString().withMessage('code must be a string'),
];

export const bulkCreateValidation = [
  ...amountRules,
  body('count').isInt({ min: 1, max: 100 }).withMessage('count must be between 1 and 100'),
  body('prefix').optional().isString().withMessage('prefix must be a string'),
];

export const voucherCodeValidation = [
  param('code').isString().trim().notEmpty().withMessage('Voucher code is required'),
];
