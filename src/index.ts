// Load environment variables first
import 'dotenv/config';

import { DEFAULT_CONFIG_PATH, loadBotConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import { JsonReadingPlanStore } from './persistence/JsonReadingPlanStore.js';
import { DailyReadingJob } from './scheduler/DailyReadingJob.js';
import { ReadingAnnouncer } from './core/announcer/ReadingAnnouncer.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting daily reading bot');

  try {
    const config = await loadBotConfig(process.env.BOT_CONFIG_PATH || DEFAULT_CONFIG_PATH);

    const telegramAdapter = new TelegramAdapter(config);
    const planStore = new JsonReadingPlanStore(config.jsonFilePath);
    const dailyReadingJob = new DailyReadingJob(planStore, telegramAdapter, {
      channelId: config.channelId,
      timezone: config.timezone,
    });
    const announcer = new ReadingAnnouncer(telegramAdapter, dailyReadingJob, config.timezone);

    await announcer.start();

    if (process.argv.includes('--send-now')) {
      logger.info('Running in --send-now mode (immediate execution)');
      await dailyReadingJob.run();
      announcer.stop();
      process.exit(0);
    }

    const shutdown = (): void => {
      logger.info('Shutting down...');
      announcer.stop();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    logger.error({ err: error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
