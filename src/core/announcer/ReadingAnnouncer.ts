import type { ScheduledTask } from 'node-cron';
import type { ChannelPort } from '../../ports/ChannelPort.js';
import type { DailyReadingJob } from '../../scheduler/DailyReadingJob.js';
import { scheduleDailyReading } from '../../scheduler/index.js';
import { BotError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export type AnnouncerState = 'disconnected' | 'connecting' | 'ready';

/**
 * Connects to the chat platform and, once connected, owns the single daily trigger.
 */
export class ReadingAnnouncer {
  private readonly logger = createLogger({ service: 'ReadingAnnouncer' });
  private currentState: AnnouncerState = 'disconnected';
  private task: ScheduledTask | null = null;

  constructor(
    private readonly channelPort: ChannelPort,
    private readonly job: DailyReadingJob,
    private readonly timezone: string
  ) {}

  get state(): AnnouncerState {
    return this.currentState;
  }

  async start(): Promise<void> {
    if (this.currentState !== 'disconnected') {
      throw new BotError(`Cannot start announcer while ${this.currentState}`, 'ANNOUNCER_STATE');
    }

    this.currentState = 'connecting';
    try {
      await this.channelPort.connect();
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to connect to Telegram. Please check your token.');
      this.currentState = 'disconnected';
      throw error;
    }

    this.task = scheduleDailyReading(this.job, this.timezone);
    this.currentState = 'ready';
    this.logger.info({ timezone: this.timezone }, 'Announcer ready; waiting for midnight');
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    this.currentState = 'disconnected';
    this.logger.info('Announcer stopped');
  }
}
