export {
  VoucherService,
  VoucherOptions,
  CreateVoucherInput,
  BulkCreateInput,
  BulkCreateResult,
  RedemptionResult,
  VoucherInspection,
  VoucherState,
} from './voucher.service';
export { VoucherController } from './voucher.controller';
export { createVoucherRoutes } from './voucher.routes';
export { generateVoucherCode, normalizeVoucherCode, isValidVoucherCode } from './voucher.codes';
