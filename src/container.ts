import { AuthService } from './auth/auth.service';
import { AppConfig, config as defaultConfig } from './config';
import { AdminController, AdminService } from './services/admin';
import { CampaignController, CampaignService } from './services/campaign';
import {
  LoggingNotificationPublisher,
  NotificationPublisher,
  QueueNotificationPublisher,
} from './services/notification';
import { MaintenanceSweeper, OrderController, OrderService } from './services/order';
import { LedgerSource, PaymentPoller, TonCenterLedgerSource } from './services/payment';
import { PricingService } from './services/pricing';
import { ReconciliationService } from './services/reconciliation';
import { createLedgerStore, LedgerStore } from './stores';
import { Clock, systemClock } from './utils/clock';

export interface ContainerOptions {
  config?: AppConfig;
  store?: LedgerStore;
  ledgerSource?: LedgerSource;
  notifier?: NotificationPublisher;
  clock?: Clock;
  referenceCodes?: () => string;
}

export interface Container {
  config: AppConfig;
  store: LedgerStore;
  notifier: NotificationPublisher;
  auth: AuthService;
  pricing: PricingService;
  orders: OrderService;
  campaigns: CampaignService;
  reconciliation: ReconciliationService;
  admin: AdminService;
  pollers: PaymentPoller[];
  sweeper: MaintenanceSweeper;
  controllers: {
    orders: OrderController;
    campaigns: CampaignController;
    admin: AdminController;
  };
}

/**
 * Wire every service from one config. Tests pass their own store, ledger
 * source, notifier, clock and reference code generator.
 */
export const createContainer = (options: ContainerOptions = {}): Container => {
  const config = options.config ?? defaultConfig;
  const clock = options.clock ?? systemClock;
  const store = options.store ?? createLedgerStore(config.storageDriver);
  const notifier =
    options.notifier ??
    (config.storageDriver === 'memory'
      ? new LoggingNotificationPublisher()
      : new QueueNotificationPublisher());
  const ledgerSource = options.ledgerSource ?? new TonCenterLedgerSource(config.ledgerSource);

  const auth = new AuthService(config.jwt);
  const pricing = new PricingService(config.pricing);
  const orders = new OrderService({
    store,
    pricing,
    receivingAddresses: config.receivingAddresses,
    config: config.order,
    clock,
    referenceCodes: options.referenceCodes,
    sweepBatchLimit: config.reconciliation.sweepBatchLimit,
  });
  const campaigns = new CampaignService({
    store,
    notifier,
    clock,
    batchLimit: config.reconciliation.sweepBatchLimit,
  });
  const reconciliation = new ReconciliationService({
    store,
    orders,
    campaigns,
    toleranceBasisPoints: config.reconciliation.toleranceBasisPoints,
    clock,
  });
  const admin = new AdminService({ store, campaigns, clock });

  const pollers = config.receivingAddresses.map(
    (address) =>
      new PaymentPoller({
        address,
        source: ledgerSource,
        store,
        reconciliation,
        config: config.poller,
        clock,
      })
  );
  const sweeper = new MaintenanceSweeper({
    orders,
    campaigns,
    intervalMs: config.reconciliation.sweepIntervalMs,
  });

  return {
    config,
    store,
    notifier,
    auth,
    pricing,
    orders,
    campaigns,
    reconciliation,
    admin,
    pollers,
    sweeper,
    controllers: {
      orders: new OrderController(orders, pricing),
      campaigns: new CampaignController(campaigns),
      admin: new AdminController(admin),
    },
  };
};
