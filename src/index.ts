import { config as loadEnv } from 'dotenv';
import { loadConfig } from './config';
import { RespaSourceClient } from './services/sourceClient';
import { SnapshotStore } from './storage/snapshotStore';
import { TelegramNotifier, createTelegramSender } from './bot/telegramNotifier';
import { AvailabilityMonitor } from './services/availabilityMonitor';
import { PollingScheduler } from './services/pollingScheduler';

async function bootstrap() {
  loadEnv();
  const config = loadConfig(process.env);

  const monitor = new AvailabilityMonitor(
    new RespaSourceClient(config.source),
    new SnapshotStore(config.storageFile, config.timeZone),
    new TelegramNotifier(createTelegramSender(config.telegram), config.telegram.chatId, config.timeZone)
  );

  console.log(`🚀 Watching resource ${config.source.resourceId} (${config.source.lookaheadDays} days ahead)`);
  console.log(`💾 Snapshot file: ${config.storageFile}`);

  if (process.argv.includes('--once')) {
    if (!(await monitor.checkOnce())) {
      process.exitCode = 1;
    }
    return;
  }

  const scheduler = new PollingScheduler(() => monitor.runCycle(), config.pollIntervalMs);
  scheduler.start();
  console.log(`⏱ Checking every ${Math.round(config.pollIntervalMs / 1000)}s`);

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Stopping (${signal})...`);
    scheduler.stop().then(
      () => console.log('👋 Stopped'),
      (error: unknown) => {
        console.error('❌ Failed to stop cleanly:', error);
        process.exitCode = 1;
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((error) => {
  console.error('❌ Failed to start availability watcher:', error);
  process.exitCode = 1;
});
