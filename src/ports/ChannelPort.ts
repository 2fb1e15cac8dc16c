export type DeliveryFailureReason = 'channel_not_found' | 'send_rejected';

export type DeliveryResult =
  | { ok: true; messageId: number }
  | { ok: false; reason: DeliveryFailureReason; error: unknown };

export interface ChannelPort {
  /** Authenticate with the platform. Rejects when the token is refused. */
  connect(): Promise<void>;
  /** Resolve the channel and post `text` to it. Failures are returned, never thrown. */
  sendToChannel(channelId: number, text: string): Promise<DeliveryResult>;
}
