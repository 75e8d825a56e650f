import http from 'http';
import { pool } from './config/database';
import logger from './config/logger';
import { settings } from './config/settings';
import { initSchema } from './database/schema';
import { createApp } from './app';
import { TelegramTransport } from './channels/telegram.transport';
import { InboundDispatcher } from './channels/inbound.events';
import { MySqlRecordStore } from './services/mysqlRecordStore.service';
import { PolicyService } from './services/policy.service';
import { TenantRegistry } from './services/tenantRegistry.service';
import { MessageRouter } from './services/messageRouter.service';
import { LifecycleOrchestrator } from './services/lifecycle.service';
import { OnboardingService } from './services/onboarding.service';
import { TrialService } from './services/trial.service';
import { CleanupService } from './services/cleanup.service';
import { BroadcastService } from './services/broadcast.service';
import { RelayScheduler } from './services/scheduler.service';

const main = async () => {
  if (!settings.botToken) {
    throw new Error('BOT_TOKEN is not defined');
  }

  await initSchema();

  const { timeouts } = settings;
  const store = new MySqlRecordStore();
  const policy = new PolicyService(settings);
  const registry = new TenantRegistry({ closeTimeoutMs: timeouts.transportMs });
  const frontDoor = new TelegramTransport();

  const router = new MessageRouter({ store, registry, policy, frontDoor, footerText: settings.footerText, timeouts });
  const lifecycle = new LifecycleOrchestrator({
    store,
    registry,
    policy,
    createTransport: () => new TelegramTransport(),
    bindInbound: (ownerId, transport) => dispatcher.dedicatedHandler(ownerId, transport),
    timeouts,
  });
  const onboarding = new OnboardingService({ store, lifecycle, timeouts });
  const dispatcher: InboundDispatcher = new InboundDispatcher({
    store,
    router,
    onboarding,
    policy,
    quota: settings.quota,
    frontDoorUsername: settings.botUsername,
    footerText: settings.footerText,
    timeouts,
  });

  const trials = new TrialService({ store, policy, selectTransport: (owner) => router.selectTransport(owner), timeouts });
  const cleanup = new CleanupService({
    store,
    retentionDays: settings.retentionDays,
    timeZone: settings.timeZone,
    storeTimeoutMs: timeouts.storeMs,
  });
  const broadcasts = new BroadcastService({ store, frontDoor, timeouts });
  const scheduler = new RelayScheduler({ cleanup, lifecycle, trials }, settings.timeZone);

  let server: http.Server | null = null;
  let stopping = false;
  const shutdown = async (reason: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ reason }, 'Shutting down');

    scheduler.stop();
    server?.close();
    try {
      await lifecycle.shutdown();
      await frontDoor.close();
      await pool.end();
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exitCode = 1;
    }
  };

  // front door first, then every eligible dedicated bot
  frontDoor.subscribe(dispatcher.frontDoorHandler(frontDoor));
  frontDoor.onFailure((error) => {
    logger.fatal({ err: error }, 'Front-door bot stopped polling');
    process.exitCode = 1;
    void shutdown('front-door failure');
  });
  const identity = await frontDoor.open(settings.botToken);
  logger.info({ bot: identity.username }, 'Front-door bot started');

  await lifecycle.startAll();
  scheduler.start();

  const app = createApp(
    { store, registry, lifecycle, onboarding, trials, cleanup, broadcasts, storeTimeoutMs: timeouts.storeMs },
    { secret: settings.jwtAdminSecret, adminIds: settings.adminIds }
  );
  server = http.createServer(app);
  server.listen(settings.port, () => {
    logger.info(`Server is running on port ${settings.port}`);
  });

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
};

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start relay');
  process.exit(1);
});
