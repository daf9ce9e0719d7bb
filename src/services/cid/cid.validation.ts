import { body, param, query } from 'express-validator';

export const cidRequestValidation = [
  body('installationId')
    .isString()
    .withMessage('installationId is required')
    .trim()
    .notEmpty()
    .withMessage('installationId is required')
    .isLength({ max: 128 })
    .withMessage('installationId is too long'),
];

export const cidRequestIdValidation = [
  param('id').isString().trim().notEmpty().withMessage('Request id is required'),
];

export const cidListValidation = [
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100'),
];
