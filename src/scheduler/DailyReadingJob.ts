import type { ChannelPort } from '../ports/ChannelPort.js';
import type { ReadingPlanSource } from '../persistence/JsonReadingPlanStore.js';
import { findReadingForDay, formatDailyMessage } from '../core/reading/ReadingMessageBuilder.js';
import { getDayOfYear } from '../utils/dates.js';
import { createLogger } from '../utils/logger.js';

export interface DailyReadingJobOptions {
  channelId: number;
  timezone: string;
  /** Clock used to pick the day; defaults to the system time. */
  now?: () => Date;
}

export class DailyReadingJob {
  private readonly logger = createLogger({ job: 'DailyReadingJob' });
  private readonly channelId: number;
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(
    private readonly planSource: ReadingPlanSource,
    private readonly channelPort: ChannelPort,
    options: DailyReadingJobOptions
  ) {
    this.channelId = options.channelId;
    this.timezone = options.timezone;
    this.now = options.now ?? (() => new Date());
  }

  /** One firing. Every failure ends up in the log; the returned promise always resolves. */
  async run(): Promise<void> {
    const logger = this.logger.child({ method: 'run' });

    try {
      const records = await this.planSource.load();
      const today = this.now();
      const dayOfYear = getDayOfYear(today, this.timezone);

      const record = findReadingForDay(records, dayOfYear);
      if (!record) {
        logger.warn({ day: dayOfYear }, `No reading found for day ${dayOfYear}`);
        return;
      }

      const message = formatDailyMessage(record, today, this.timezone);
      const result = await this.channelPort.sendToChannel(this.channelId, message);

      if (!result.ok) {
        if (result.reason === 'channel_not_found') {
          logger.error({ err: result.error, channelId: this.channelId }, `Could not find channel with ID ${this.channelId}`);
        } else {
          logger.error({ err: result.error, day: dayOfYear }, 'Channel rejected the Bible reading message');
        }
        return;
      }

      logger.info({ day: dayOfYear, messageId: result.messageId }, `Successfully sent Bible reading for day ${dayOfYear}`);
    } catch (error) {
      logger.error({ err: error }, 'Error sending Bible message');
    }
  }
}
