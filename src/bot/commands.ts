import type { PositionManager } from '../core/positionManager.js';
import { formatFailure, formatOpened, formatStatus, OPENING_TEXT } from './messages.js';

export type Reply = (text: string) => Promise<unknown>;
export type Trader = Pick<PositionManager, 'open' | 'close' | 'status' | 'currentState'>;

export async function tradeCommand(trader: Trader, reply: Reply): Promise<void> {
  if (trader.currentState !== 'idle') {
    await reply('⚠️ A position is already active');
    return;
  }

  await reply(OPENING_TEXT);
  const result = await trader.open();
  await reply(result.ok ? formatOpened(result.value) : formatFailure('open', result.error));
}

export async function statusCommand(trader: Trader, reply: Reply): Promise<void> {
  await reply(formatStatus(trader.status()));
}

export async function closeCommand(trader: Trader, reply: Reply): Promise<void> {
  const result = await trader.close();
  // A successful close is announced by the notifier in this same chat
  if (!result.ok) {
    await reply(formatFailure('close', result.error));
  }
}
