import crypto from 'crypto';

const prefixed = (prefix: string): string =>
  `${prefix}_${crypto.randomUUID().replace(/-/g, '')}`;

export const generateTransactionId = (): string => prefixed('ltx');
export const generateCidRequestId = (): string => prefixed('cid');
export const generateReservationId = (): string => prefixed('rsv');
export const generateAdminLogId = (): string => prefixed('adm');
