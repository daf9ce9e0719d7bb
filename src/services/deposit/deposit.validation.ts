import { body } from 'express-validator';

export const processDepositValidation = [
  body('txid')
    .isString()
    .withMessage('txid is required')
    .trim()
    .matches(/^[0-9a-fA-F]{64}$/)
    .withMessage('txid must be 64 hexadecimal characters'),
];
