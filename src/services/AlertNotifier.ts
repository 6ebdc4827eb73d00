import { Telegraf } from 'telegraf';
import { TelegramConfig } from '../config/scraper.config';
import { IFundingRepository } from '../database/interfaces/IFundingRepository';
import { ArbitrageAlert } from '../types/common';
import { RateLimiter, formatPercentage } from '../utils/helpers';
import { logger } from '../utils/logger';
import { rankOpportunities } from './ArbitrageDetector';

export interface MessageSender {
  sendMessage(chatId: string, text: string, extra: { parse_mode: 'HTML' }): Promise<unknown>;
}

export interface IAlertNotifier {
  /** Sends stored, not yet notified alerts and marks the delivered ones; returns how many were sent */
  notifyPending(): Promise<number>;
}

export const telegramSender = (botToken: string): MessageSender => {
  const bot = new Telegraf(botToken);
  return {
    sendMessage: (chatId, text, extra) => bot.telegram.sendMessage(chatId, text, extra),
  };
};

const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export const formatAlertMessage = (alert: ArbitrageAlert): string => {
  const direction = alert.arbitrageValue > 0 ? 'Hyperliquid pays more' : `${alert.exchange} pays more`;
  return [
    `🚨 <b>Funding arbitrage: ${escapeHtml(alert.coin)}</b>`,
    '',
    `⏱ Timeframe: ${alert.timeframe}`,
    `🔵 Hyperliquid: ${formatPercentage(alert.referenceFunding)}`,
    `🟡 ${alert.exchange}: ${formatPercentage(alert.exchangeFunding)}`,
    `📈 Spread: <b>${formatPercentage(alert.arbitrageValue)}</b> (${escapeHtml(direction)})`,
    `🎯 Threshold: ${formatPercentage(alert.thresholdAtGeneration, 2)}`,
  ].join('\n');
};

/**
 * Pushes arbitrage alerts to a Telegram chat. Delivery is throttled per
 * minute; alerts that could not be sent stay unnotified for the next tick.
 */
export class AlertNotifier implements IAlertNotifier {
  private readonly rateLimiter: RateLimiter;

  constructor(
    private readonly repository: IFundingRepository,
    private readonly sender: MessageSender,
    private readonly config: Pick<TelegramConfig, 'chatId' | 'maxMessagesPerMinute'>,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.rateLimiter = new RateLimiter(config.maxMessagesPerMinute, 60000);
  }

  public static fromConfig(repository: IFundingRepository, config: TelegramConfig): AlertNotifier | null {
    if (!config.enabled) {
      return null;
    }
    return new AlertNotifier(repository, telegramSender(config.botToken), config);
  }

  public async notifyPending(): Promise<number> {
    const pending = await this.repository.listAlerts({
      onlyUnnotified: true,
      limit: this.config.maxMessagesPerMinute,
    });
    if (pending.length === 0) {
      return 0;
    }

    const delivered: number[] = [];
    for (const alert of rankOpportunities(pending)) {
      if (alert.id === undefined) {
        continue;
      }
      if (!this.rateLimiter.tryAcquire(this.clock().getTime())) {
        logger.warn('Telegram rate limit reached, deferring remaining alerts');
        break;
      }

      try {
        await this.sender.sendMessage(this.config.chatId, formatAlertMessage(alert), { parse_mode: 'HTML' });
        delivered.push(alert.id);
      } catch (error) {
        logger.error('Failed to send Telegram alert:', {
          coin: alert.coin,
          exchange: alert.exchange,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (delivered.length > 0) {
      await this.repository.markAlertsNotified(delivered, this.clock());
      logger.info(`Sent ${delivered.length} arbitrage alert(s) to Telegram`);
    }
    return delivered.length;
  }
}
