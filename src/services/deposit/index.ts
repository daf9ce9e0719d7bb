export {
  DepositService,
  DepositOptions,
  DepositOutcome,
  DepositAddress,
  VerifiedPayment,
} from './deposit.service';
export { DepositController } from './deposit.controller';
export { createDepositRoutes } from './deposit.routes';
