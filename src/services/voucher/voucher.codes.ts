import crypto from 'crypto';

export const VOUCHER_CODE_PATTERN = /^[A-Z0-9_-]{6,20}$/;
export const VOUCHER_PREFIX_PATTERN = /^[A-Z0-9]{1,8}$/;

export const normalizeVoucherCode = (code: string): string => code.trim().toUpperCase();

export const isValidVoucherCode = (code: string): boolean => VOUCHER_CODE_PATTERN.test(code);

/**
 * `prefix` followed by random characters from `alphabet` up to `length`
 */
export const generateVoucherCode = (prefix: string, length: number, alphabet: string): string => {
  let code = prefix;
  while (code.length < length) {
    code += alphabet[crypto.randomInt(alphabet.length)];
  }
  return code;
};
