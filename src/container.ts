/**
 * Service wiring
 *
 * Builds every engine on one ledger store. The server passes MongoDB and
 * the real HTTP clients; tests pass the memory store and fakes.
 */

import { AuthOptions } from './auth/auth.types';
import { AuthService } from './auth/auth.service';
import { ChainExplorer } from './clients/chain-explorer';
import { KeyIssuer } from './clients/key-issuer';
import { config } from './config';
import { HealthChecks } from './routes/health';
import { AdminService } from './services/admin/admin.service';
import { PackageCatalog } from './services/catalog/package.catalog';
import { CidOptions, CidService } from './services/cid/cid.service';
import { DepositOptions, DepositService } from './services/deposit/deposit.service';
import { LedgerService } from './services/ledger/ledger.service';
import { PurchaseService } from './services/purchase/purchase.service';
import { ReservationOptions, ReservationService } from './services/purchase/reservation.service';
import { VoucherOptions, VoucherService } from './services/voucher/voucher.service';
import { LedgerStore } from './store/ledger.store';
import { EventPublisher } from './types/events';
import { Clock, systemClock } from './utils/clock';

export interface ContainerSettings {
  adminIds: string[];
  auth: AuthOptions;
  deposit: DepositOptions;
  reservation: ReservationOptions;
  voucher: VoucherOptions;
  cid: CidOptions;
}

export interface ContainerDependencies {
  store: LedgerStore;
  publisher: EventPublisher;
  explorer: ChainExplorer;
  keyIssuer: KeyIssuer;
  health: HealthChecks;
  catalog?: PackageCatalog;
  clock?: Clock;
  settings?: Partial<ContainerSettings>;
}

export interface Container {
  store: LedgerStore;
  health: HealthChecks;
  catalog: PackageCatalog;
  auth: AuthService;
  ledger: LedgerService;
  purchases: PurchaseService;
  reservations: ReservationService;
  vouchers: VoucherService;
  deposits: DepositService;
  cid: CidService;
  admin: AdminService;
}

export const defaultSettings = (): ContainerSettings => ({
  adminIds: config.adminIds,
  auth: {
    secret: config.jwt.secret,
    issuer: config.jwt.issuer,
    expiresInSeconds: config.jwt.expiresInSeconds,
  },
  deposit: {
    receivingAddress: config.chain.receivingAddress,
    assetContract: config.chain.assetContract,
    assetDecimals: config.chain.assetDecimals,
    network: config.chain.network,
    asset: config.chain.asset,
    minConfirmations: config.chain.minConfirmations,
    minDepositUsd: config.chain.minDepositUsd,
    toleranceCents: config.reservation.toleranceCents,
  },
  reservation: {
    ttlMinutes: config.reservation.ttlMinutes,
    toleranceCents: config.reservation.toleranceCents,
  },
  voucher: { ...config.voucher },
  cid: { keyServiceTimeoutMs: config.keyService.timeoutMs },
});

export const createContainer = (deps: ContainerDependencies): Container => {
  const settings: ContainerSettings = { ...defaultSettings(), ...deps.settings };
  const clock = deps.clock ?? systemClock;
  const catalog = deps.catalog ?? new PackageCatalog();
  const { store, publisher } = deps;

  const ledger = new LedgerService(store, { adminIds: settings.adminIds }, clock);
  const reservations = new ReservationService(
    store,
    ledger,
    catalog,
    publisher,
    settings.reservation,
    clock
  );

  return {
    store,
    health: deps.health,
    catalog,
    auth: new AuthService(settings.auth),
    ledger,
    purchases: new PurchaseService(store, ledger, catalog, publisher, clock),
    reservations,
    vouchers: new VoucherService(store, ledger, publisher, settings.voucher, clock),
    deposits: new DepositService(
      store,
      ledger,
      reservations,
      deps.explorer,
      publisher,
      settings.deposit,
      clock
    ),
    cid: new CidService(store, ledger, deps.keyIssuer, publisher, settings.cid, clock),
    admin: new AdminService(store, ledger, publisher, clock),
  };
};
