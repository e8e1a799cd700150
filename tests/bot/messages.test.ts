import { describe, expect, it } from 'vitest';
import { formatFailure, formatOpened, formatStatus } from '../../src/bot/messages.js';
import { TRADING_STOPPED, TradingError } from '../../src/core/errors.js';
import type { Position } from '../../src/core/types.js';

const POSITION: Position = {
  orderId: 'X',
  symbol: 'BTCUSDT',
  quantity: 0.01,
  entryPrice: 101,
  targetPrice: 102.01,
  openedAt: 0,
};

describe('formatOpened', () => {
  it('shows entry and target with two decimals', () => {
    expect(formatOpened({ ...POSITION, targetPrice: 102.0100000001 })).toBe(
      '✅ Position opened!\nTrading Pair: BTCUSDT\nEntry Price: 101.00\nTarget Price: 102.01'
    );
  });
});

describe('formatStatus', () => {
  it('reports no open position when idle', () => {
    expect(formatStatus({ state: 'idle' })).toBe('⚠️ No open position');
  });

  it('reports an open in progress', () => {
    expect(formatStatus({ state: 'opening' })).toBe('⏳ A position is being opened');
  });

  it('lists prices and unrealized profit', () => {
    expect(
      formatStatus({ state: 'open', position: POSITION, currentBid: 101.5, unrealizedPercent: 0.4950495 })
    ).toBe(
      '📊 Current position:\n' +
        'Trading Pair: BTCUSDT\n' +
        'Entry Price: 101\n' +
        'Target Price: 102.01\n' +
        'Current Price: 101.5\n' +
        'Profit: 0.50%'
    );
  });

  it('marks a position that is being closed', () => {
    const text = formatStatus({
      state: 'closing',
      position: POSITION,
      currentBid: 103,
      unrealizedPercent: 1.98,
    });

    expect(text.split('\n')[0]).toBe('📊 Closing position:');
  });

  it('says so when there is no current price', () => {
    expect(
      formatStatus({ state: 'open', position: POSITION, currentBid: null, unrealizedPercent: null })
    ).toBe('❌ Cannot get current price');
  });
});

describe('formatFailure', () => {
  it('tells an active position apart from missing market data', () => {
    const active = formatFailure('open', new TradingError('InvalidState', 'A position is already active'));
    const noData = formatFailure('open', new TradingError('NoMarketData', 'No market data yet'));

    expect(active).toBe('⚠️ A position is already active');
    expect(noData).toBe('❌ No market data yet, try again in a moment');
  });

  it('says trading is stopped instead of blaming an active position', () => {
    expect(formatFailure('open', new TradingError('InvalidState', TRADING_STOPPED))).toBe(
      '🛑 Trading is stopped, no new positions are opened'
    );
  });

  it('warns that a timed-out open may have filled', () => {
    expect(
      formatFailure('open', new TradingError('ConfirmationTimeout', 'No order confirmation received in time'))
    ).toBe(
      '⌛ No confirmation from the exchange. The order may still have filled, check the exchange before retrying'
    );
  });

  it('includes the exchange reason for rejections', () => {
    expect(
      formatFailure('close', new TradingError('GatewayRejected', 'Order rejected: [10001] params error'))
    ).toBe('❌ Could not close the position: Order rejected: [10001] params error');
  });
});
