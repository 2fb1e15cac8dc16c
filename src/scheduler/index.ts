import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { localDateKey } from '../utils/dates.js';
import type { DailyReadingJob } from './DailyReadingJob.js';

const logger = createLogger({ component: 'scheduler' });

/**
 * Checked at the top of every minute. Matching "0 0 0 * * *" exactly would miss days
 * whose local midnight falls in a DST gap (00:00 jumps straight to 01:00).
 */
export const DAY_ROLLOVER_CRON = '0 * * * * *';

/**
 * Run `job` once per local calendar day, on the first tick after the date changes:
 * 00:00:00 normally, or the first minute after a DST gap at midnight.
 */
export function scheduleDailyReading(job: DailyReadingJob, timezone: string): ScheduledTask {
  let lastDate = localDateKey(new Date(), timezone);
  logger.info({ cronExpression: DAY_ROLLOVER_CRON, timezone, lastDate }, 'Scheduling daily reading job');

  return cron.schedule(
    DAY_ROLLOVER_CRON,
    () => {
      const today = localDateKey(new Date(), timezone);
      if (today === lastDate) {
        return;
      }
      lastDate = today;
      logger.info({ date: today }, 'Local day rolled over; running daily reading job');
      job.run().catch((error: unknown) => {
        logger.error({ err: error }, 'Daily reading job failed');
      });
    },
    { timezone }
  );
}
