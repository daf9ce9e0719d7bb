/**
 * Admin API Validation Rules
 */

import { body, param, query } from 'express-validator';

import { signedUsdToCents } from '../../utils/money';

export const userIdValidation = [
  param('id').isString().trim().notEmpty().withMessage('User id is required'),
];

export const adjustValidation = [
  ...userIdValidation,

  body('cid').optional().isInt().withMessage('cid must be a whole number'),

  body('usd')
    .optional()
    .custom(
      (value: unknown) =>
        (typeof value === 'number' || typeof value === 'string') &&
        signedUsdToCents(value) !== null
    )
    .withMessage('usd must be an amount with at most 2 decimal places'),

  body('reason')
    .isString()
    .withMessage('reason is required')
    .trim()
    .isLength({ min: 1, max: 500 })
    .withMessage('reason must be between 1 and 500 characters'),
];

export const banValidation = [
  ...userIdValidation,
  body('reason').optional().isString().isLength({ max: 500 }).withMessage('reason is too long'),
];

export const setAdminValidation = [
  ...userIdValidation,
  body('isAdmin').isBoolean({ strict: true }).withMessage('isAdmin must be a boolean'),
];

export const logListValidation = [
  query('targetUserId').optional().isString(),
  query('limit')
    .optional()
    .isInt({ min: 1, max: 200 })
    .withMessage('Limit must be between 1 and 200'),
];

export const reconcileValidation = [
  param('id').isString().trim().notEmpty().withMessage('Request id is required'),
  body('writeOff').optional().isBoolean({ strict: true }).withMessage('writeOff must be a boolean'),
];
