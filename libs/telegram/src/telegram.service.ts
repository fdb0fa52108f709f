import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { errorMessage } from '@libs/core';
import { NotificationSink } from '@libs/market-data';
import {
  formatErrorMessage,
  formatHealthIssueMessage,
  formatHeartbeatMessage,
  formatStartupMessage,
} from './telegram.formatter';

/** Operational alerts to one chat. Without a token and chat id every call is a no-op. */
@Injectable()
export class TelegramNotifierService implements NotificationSink {
  private readonly logger = new Logger(TelegramNotifierService.name);
  private readonly bot: Telegraf | null;
  private readonly chatId: string;

  constructor(configService: ConfigService) {
    const enabled = configService.get<boolean>('TELEGRAM_ENABLED', true) !== false;
    const token = configService.get<string>('TELEGRAM_BOT_TOKEN', '').trim();
    this.chatId = configService.get<string>('TELEGRAM_CHAT_ID', '').trim();
    this.bot = enabled && token && this.chatId ? new Telegraf(token) : null;
    if (!this.bot) {
      this.logger.log(JSON.stringify({ event: 'telegram_disabled' }));
    }
  }

  get enabled(): boolean {
    return this.bot !== null;
  }

  notifyStartup(readiness: Record<string, boolean>): Promise<void> {
    return this.send(formatStartupMessage(readiness));
  }

  notifyHealthIssue(title: string, details: string): Promise<void> {
    return this.send(formatHealthIssueMessage(title, details));
  }

  notifyError(context: string, message: string): Promise<void> {
    return this.send(formatErrorMessage(context, message));
  }

  sendHeartbeat(summary: Record<string, string | number>): Promise<void> {
    return this.send(formatHeartbeatMessage(summary));
  }

  private async send(message: string): Promise<void> {
    if (!this.bot) {
      return;
    }
    try {
      await this.bot.telegram.sendMessage(this.chatId, message, {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: true },
      });
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'telegram_send_failed', message: errorMessage(error) }));
    }
  }
}
