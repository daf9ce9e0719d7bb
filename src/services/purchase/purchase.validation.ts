import { param } from 'express-validator';

export const packageIdValidation = [
  param('id')
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Package id is required')
    .isLength({ max: 32 })
    .withMessage('Package id is too long'),
];
