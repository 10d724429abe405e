import { Telegram } from 'telegraf';
import type { TimeRange } from '../core/timeRange';
import { buildAvailabilityMessages } from '../core/notifications';
import type { AvailabilityNotifier, TelegramSettings } from '../types';

export interface MessageSender {
  sendMessage(chatId: string | number, text: string): Promise<unknown>;
}

export function createTelegramSender(settings: TelegramSettings): MessageSender {
  return new Telegram(settings.botToken);
}

export class TelegramNotifier implements AvailabilityNotifier {
  constructor(
    private readonly sender: MessageSender,
    private readonly chatId: string,
    private readonly timeZone: string
  ) {}

  async notify(ranges: TimeRange[]): Promise<void> {
    const messages = buildAvailabilityMessages(ranges, this.timeZone);
    for (const text of messages) {
      await this.sender.sendMessage(this.chatId, text);
    }
    if (messages.length) {
      console.log(`📨 Sent ${messages.length} message(s) about ${ranges.length} new range(s)`);
    }
  }
}
