import { noopLogger, type Logger } from '../core/logging.js';
import type { NotificationSink } from '../core/types.js';

/** The part of grammy's `bot.api` the notifier calls. */
export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

export class TelegramNotifier implements NotificationSink {
  constructor(
    private readonly api: MessageSender,
    private readonly chatId: string,
    private readonly log: Logger = noopLogger
  ) {}

  async notify(text: string): Promise<void> {
    try {
      await this.api.sendMessage(this.chatId, text);
      this.log.info('Sent notification to Telegram:', text);
    } catch (e) {
      this.log.error('Error while sending notification to Telegram:', e);
    }
  }
}
