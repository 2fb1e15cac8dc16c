import type { ChannelPort, DeliveryResult } from '../../ports/ChannelPort.js';
import type { BotConfig } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { TelegramError } from '../../utils/errors.js';
import TelegramBot from 'node-telegram-bot-api';

export class TelegramAdapter implements ChannelPort {
  private readonly logger = createLogger({ adapter: 'TelegramAdapter' });
  private readonly bot: TelegramBot;

  constructor(config: Pick<BotConfig, 'token'>) {
    // Outbound only: nothing is read from the chat, so no polling or webhook
    this.bot = new TelegramBot(config.token, { polling: false });
  }

  async connect(): Promise<void> {
    const logger = this.logger.child({ method: 'connect' });
    logger.info('Connecting to Telegram');

    try {
      const me = await this.bot.getMe();
      logger.info({ botId: me.id, botUsername: me.username }, `Logged in as ${me.username ?? me.first_name}`);
    } catch (error) {
      logger.error({ err: error }, 'Failed to verify Telegram bot token');
      throw new TelegramError('Failed to connect to Telegram', { cause: error });
    }
  }

  async sendToChannel(channelId: number, text: string): Promise<DeliveryResult> {
    const logger = this.logger.child({ method: 'sendToChannel', channelId });

    try {
      await this.bot.getChat(channelId);
    } catch (error) {
      logger.error({ err: error }, 'Channel could not be resolved');
      return { ok: false, reason: 'channel_not_found', error };
    }

    try {
      logger.info({ textLength: text.length }, 'Sending message');
      const sentMessage = await this.bot.sendMessage(channelId, text);
      logger.info({ messageId: sentMessage.message_id }, 'Message sent successfully');
      return { ok: true, messageId: sentMessage.message_id };
    } catch (error) {
      logger.error({ err: error }, 'Failed to send message');
      return { ok: false, reason: 'send_rejected', error };
    }
  }
}
