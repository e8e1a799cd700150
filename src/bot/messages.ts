import { TRADING_STOPPED, type TradingError } from '../core/errors.js';
import type { Position, StatusReport } from '../core/types.js';

export const HELP_TEXT =
  '👋 Hello! I am a trading bot for Bybit.\n' +
  'Available commands:\n' +
  '/trade - open a new position\n' +
  '/status - check the current position\n' +
  '/close - close the current position now\n' +
  '/download_logs - get the trade journal';

export const OPENING_TEXT = '⏳ Opening a position, please wait...';

export function formatOpened(position: Position): string {
  return (
    `✅ Position opened!\n` +
    `Trading Pair: ${position.symbol}\n` +
    `Entry Price: ${position.entryPrice.toFixed(2)}\n` +
    `Target Price: ${position.targetPrice.toFixed(2)}`
  );
}

export function formatStatus(report: StatusReport): string {
  switch (report.state) {
    case 'idle':
      return '⚠️ No open position';
    case 'opening':
      return '⏳ A position is being opened';
    case 'open':
    case 'closing': {
      const { position, currentBid, unrealizedPercent } = report;
      if (currentBid === null || unrealizedPercent === null) {
        return '❌ Cannot get current price';
      }
      const header = report.state === 'closing' ? '📊 Closing position:' : '📊 Current position:';
      return (
        `${header}\n` +
        `Trading Pair: ${position.symbol}\n` +
        `Entry Price: ${position.entryPrice}\n` +
        `Target Price: ${position.targetPrice}\n` +
        `Current Price: ${currentBid}\n` +
        `Profit: ${unrealizedPercent.toFixed(2)}%`
      );
    }
  }
}

export function formatFailure(action: 'open' | 'close', error: TradingError): string {
  switch (error.kind) {
    case 'InvalidState':
      if (error.message === TRADING_STOPPED) {
        return '🛑 Trading is stopped, no new positions are opened';
      }
      return action === 'open'
        ? '⚠️ A position is already active'
        : '⚠️ No open position to close';
    case 'NoMarketData':
      return '❌ No market data yet, try again in a moment';
    case 'ConfirmationTimeout':
      return action === 'open'
        ? '⌛ No confirmation from the exchange. The order may still have filled, check the exchange before retrying'
        : '⌛ No confirmation from the exchange, the position stays open';
    case 'GatewayRejected':
      return `❌ Could not ${action} the position: ${error.message}`;
  }
}
