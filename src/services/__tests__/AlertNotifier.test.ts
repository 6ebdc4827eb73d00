import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { AlertNotifier, MessageSender, formatAlertMessage } from '../AlertNotifier';
import { InMemoryFundingRepository } from '../../database/memory.client';
import { at, makeAlert, makeSnapshot } from '../../__tests__/factories';

const ethRef = { coin: 'ETH', timeframe: 'hourly' as const, scrapedAt: at('2024-05-01T10:00:00Z') };

describe('formatAlertMessage', () => {
  it('renders an HTML alert', () => {
    expect(formatAlertMessage(makeAlert())).toBe(
      [
        '🚨 <b>Funding arbitrage: BTC</b>',
        '',
        '⏱ Timeframe: hourly',
        '🔵 Hyperliquid: +2.0000%',
        '🟡 binance: +0.5000%',
        '📈 Spread: <b>+1.5000%</b> (Hyperliquid pays more)',
        '🎯 Threshold: +1.00%',
      ].join('\n')
    );
  });

  it('names the exchange when it pays more', () => {
    const message = formatAlertMessage(
      makeAlert({ exchange: 'bybit', referenceFunding: -0.5, exchangeFunding: 1, arbitrageValue: -1.5 })
    );
    expect(message.split('\n')[5]).toBe('📈 Spread: <b>-1.5000%</b> (bybit pays more)');
  });
});

describe('AlertNotifier', () => {
  let now: Date;
  let repository: InMemoryFundingRepository;
  let sendMessage: Mock<Parameters<MessageSender['sendMessage']>, Promise<unknown>>;
  let sender: MessageSender;

  beforeEach(async () => {
    now = at('2024-05-01T10:01:00Z');
    repository = new InMemoryFundingRepository(() => now);
    sendMessage = vi.fn().mockResolvedValue({ message_id: 1 });
    sender = { sendMessage };

    await repository.upsertSnapshots([makeSnapshot(), makeSnapshot({ coin: 'ETH', rankByOpenInterest: 2 })]);
    await repository.insertAlerts([
      makeAlert(),
      makeAlert({ coin: 'ETH', arbitrageValue: 2.5, referenceFunding: 3, sourceSnapshotRef: ethRef }),
    ]);
  });

  const notifier = (maxMessagesPerMinute = 20): AlertNotifier =>
    new AlertNotifier(repository, sender, { chatId: 'test-chat', maxMessagesPerMinute }, () => now);

  it('sends pending alerts largest spread first and marks them notified', async () => {
    const sent = await notifier().notifyPending();

    expect(sent).toBe(2);
    expect(sendMessage).toHaveBeenCalledTimes(2);
    expect(sendMessage.mock.calls[0][0]).toBe('test-chat');
    expect(sendMessage.mock.calls[0][1]).toContain('Funding arbitrage: ETH');
    expect(sendMessage.mock.calls[1][1]).toContain('Funding arbitrage: BTC');
    expect(sendMessage.mock.calls[0][2]).toEqual({ parse_mode: 'HTML' });

    expect(await repository.listAlerts({ onlyUnnotified: true })).toEqual([]);
    const [latest] = await repository.listAlerts({ limit: 1 });
    expect(latest.notifiedAt).toEqual(now);
  });

  it('sends nothing when nothing is pending', async () => {
    const instance = notifier();
    await instance.notifyPending();
    sendMessage.mockClear();

    expect(await instance.notifyPending()).toBe(0);
    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('leaves alerts unnotified when delivery fails', async () => {
    sendMessage.mockRejectedValueOnce(new Error('chat not found'));

    const sent = await notifier().notifyPending();

    expect(sent).toBe(1);
    const pending = await repository.listAlerts({ onlyUnnotified: true });
    expect(pending.map((alert) => alert.coin)).toEqual(['ETH']);
  });

  it('defers alerts beyond the per-minute limit', async () => {
    const instance = notifier(1);

    expect(await instance.notifyPending()).toBe(1);
    expect(await instance.notifyPending()).toBe(0);
    expect((await repository.listAlerts({ onlyUnnotified: true })).map((alert) => alert.coin)).toEqual(['BTC']);

    now = at('2024-05-01T10:02:01Z');
    expect(await instance.notifyPending()).toBe(1);
    expect(await repository.listAlerts({ onlyUnnotified: true })).toEqual([]);
  });

  it('is built only when Telegram is enabled', () => {
    const disabled = AlertNotifier.fromConfig(repository, {
      enabled: false,
      botToken: '',
      chatId: '',
      maxMessagesPerMinute: 20,
    });
    const enabled = AlertNotifier.fromConfig(repository, {
      enabled: true,
      botToken: 'test-token',
      chatId: 'test-chat',
      maxMessagesPerMinute: 20,
    });

    expect(disabled).toBeNull();
    expect(enabled).toBeInstanceOf(AlertNotifier);
  });
});
