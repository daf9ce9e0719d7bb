/**
 * Ledger Module
 *
 * Balances, the append-only transaction log and the unit-of-work
 * primitives every engine posts through.
 */

export {
  LedgerService,
  CreateTransactionInput,
  LedgerEntry,
  PostedEntry,
  TransactionListOptions,
  IntegrityReport,
} from './ledger.service';
export { LedgerController } from './ledger.controller';
export { createLedgerRoutes } from './ledger.routes';
