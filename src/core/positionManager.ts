import { TRADING_CONFIG } from '../config/tradingConfig.js';
import type { QuoteCache } from '../market/quoteCache.js';
import { fail, ok, outcomeError, TRADING_STOPPED, type Result } from './errors.js';
import { noopJournal, type Journal } from './journal.js';
import { noopLogger, type Logger } from './logging.js';
import type { OrderExecutor } from './orderExecutor.js';
import type {
  ClosedPosition,
  NotificationSink,
  OrderSide,
  Position,
  PositionState,
  StatusReport,
} from './types.js';

export interface PositionManagerSettings {
  symbol: string;
  quantity: number;
  targetProfitPercent: number;
  openTimeoutMs?: number;
  closeTimeoutMs?: number;
  pollIntervalMs?: number;
  retryDelayMs?: number;
}

export interface PositionManagerDeps {
  quotes: QuoteCache;
  executor: OrderExecutor;
  notifier: NotificationSink;
  log?: Logger;
  journal?: Journal;
  now?: () => number;
}

export type OpenResult = Result<Position>;
export type CloseResult = Result<ClosedPosition>;

export function calculateTargetPrice(entryPrice: number, targetProfitPercent: number): number {
  return entryPrice * (1 + targetProfitPercent / 100);
}

export function calculateProfitPercent(entryPrice: number, price: number): number {
  return (price / entryPrice - 1) * 100;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function formatClosedNotification(closed: ClosedPosition): string {
  return (
    `✅ Position closed!\n` +
    `Trading Pair: ${closed.symbol}\n` +
    `Profit Percentage: ${closed.profitPercent.toFixed(2)}%\n` +
    `Entry Price: ${closed.entryPrice}\n` +
    `Target Price: ${closed.targetPrice}\n` +
    `Exit Price: ${closed.exitPrice}`
  );
}

/**
 * Owns the single position: idle → opening → open → closing → idle.
 * Every state change happens in this class, and always before the first await of
 * the operation that causes it.
 */
export class PositionManager {
  private state: PositionState = { kind: 'idle' };
  private monitorTask: Promise<void> | null = null;
  // Cleared in the same turn the loop exits
  private monitoring = false;
  private stopped = false;

  private readonly openTimeoutMs: number;
  private readonly closeTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly retryDelayMs: number;
  private readonly log: Logger;
  private readonly journal: Journal;
  private readonly now: () => number;

  constructor(
    private readonly settings: PositionManagerSettings,
    private readonly deps: PositionManagerDeps
  ) {
    this.openTimeoutMs = settings.openTimeoutMs ?? TRADING_CONFIG.orders.openTimeoutMs;
    this.closeTimeoutMs = settings.closeTimeoutMs ?? TRADING_CONFIG.orders.closeTimeoutMs;
    this.pollIntervalMs = settings.pollIntervalMs ?? TRADING_CONFIG.monitor.pollIntervalMs;
    this.retryDelayMs = settings.retryDelayMs ?? TRADING_CONFIG.monitor.retryDelayMs;
    this.log = deps.log ?? noopLogger;
    this.journal = deps.journal ?? noopJournal;
    this.now = deps.now ?? Date.now;
  }

  get currentState(): PositionState['kind'] {
    return this.state.kind;
  }

  get isMonitoring(): boolean {
    return this.monitoring;
  }

  async open(): Promise<OpenResult> {
    if (this.stopped) {
      return fail('InvalidState', TRADING_STOPPED);
    }
    if (this.state.kind !== 'idle') {
      this.log.warn(`Open rejected: position is ${this.state.kind}`);
      return fail('InvalidState', 'A position is already active');
    }

    const quote = this.deps.quotes.read();
    if (!quote) {
      this.log.error('Cannot open position: no orderbook data');
      return fail('NoMarketData', 'No market data yet');
    }

    const { symbol, quantity, targetProfitPercent } = this.settings;
    // The pre-trade ask is the entry reference, not the fill price
    const entryPrice = quote.ask;
    this.state = { kind: 'opening' };

    const outcome = await this.deps.executor.execute(
      { side: 'Buy', symbol, quantity },
      this.openTimeoutMs
    );

    if (outcome.status !== 'filled') {
      this.state = { kind: 'idle' };
      const error = outcomeError(outcome);
      this.recordFailure('Buy', error.kind, error.message);
      return { ok: false, error };
    }

    const position: Position = Object.freeze({
      orderId: outcome.orderId,
      symbol,
      quantity,
      entryPrice,
      targetPrice: calculateTargetPrice(entryPrice, targetProfitPercent),
      openedAt: this.now(),
    });
    this.state = { kind: 'open', position };

    this.log.info('Opened new position:', position);
    this.journal({
      type: 'position_opened',
      symbol,
      orderId: position.orderId,
      quantity,
      entryPrice,
      targetPrice: position.targetPrice,
    });

    this.startMonitoring();
    return ok(position);
  }

  async close(): Promise<CloseResult> {
    if (this.state.kind !== 'open') {
      return fail('InvalidState', `No open position to close (state: ${this.state.kind})`);
    }

    const { position } = this.state;
    const exitBid = this.deps.quotes.read()?.bid;
    if (exitBid === undefined) {
      this.log.warn('Cannot close position: no orderbook data');
      return fail('NoMarketData', 'No market data yet');
    }

    this.state = { kind: 'closing', position };

    const outcome = await this.deps.executor.execute(
      { side: 'Sell', symbol: position.symbol, quantity: position.quantity },
      this.closeTimeoutMs
    );

    if (outcome.status !== 'filled') {
      // The position is still ours; the monitor will try again
      this.state = { kind: 'open', position };
      const error = outcomeError(outcome);
      this.log.error('Error closing position:', error.message);
      this.recordFailure('Sell', error.kind, error.message);
      return { ok: false, error };
    }

    const closed: ClosedPosition = {
      ...position,
      closeOrderId: outcome.orderId,
      exitPrice: exitBid,
      profitPercent: calculateProfitPercent(position.entryPrice, exitBid),
      closedAt: this.now(),
    };
    this.state = { kind: 'idle' };

    this.log.info('Position closed successfully:', closed);
    this.journal({
      type: 'position_closed',
      symbol: closed.symbol,
      orderId: closed.closeOrderId,
      exitPrice: closed.exitPrice,
      profitPercent: closed.profitPercent,
    });
    await this.deliver(formatClosedNotification(closed));

    return ok(closed);
  }

  status(): StatusReport {
    const { state } = this;
    if (state.kind === 'idle') return { state: 'idle' };
    if (state.kind === 'opening') return { state: 'opening' };

    const currentBid = this.deps.quotes.read()?.bid ?? null;
    return {
      state: state.kind,
      position: state.position,
      currentBid,
      unrealizedPercent:
        currentBid === null ? null : calculateProfitPercent(state.position.entryPrice, currentBid),
    };
  }

  /** Stops monitoring and waits for the loop to exit. Does not touch the position. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.monitorTask;
  }

  private startMonitoring(): void {
    if (this.monitoring) return;

    this.monitoring = true;
    this.monitorTask = this.monitor().catch((err: unknown) => {
      this.log.error('Monitoring loop crashed:', err);
    });
  }

  private async monitor(): Promise<void> {
    this.log.info('Monitoring position');

    try {
      while (!this.stopped && (this.state.kind === 'open' || this.state.kind === 'closing')) {
        try {
          const position = this.state.kind === 'open' ? this.state.position : null;
          const bid = this.deps.quotes.read()?.bid;

          if (bid === undefined) {
            this.log.warn('No orderbook data available for monitoring');
            await sleep(this.retryDelayMs);
            continue;
          }

          if (position && bid >= position.targetPrice) {
            this.log.info(`Target reached: bid ${bid} >= ${position.targetPrice}`);
            const result = await this.close();
            if (!result.ok) {
              await sleep(this.pollIntervalMs);
            }
            continue;
          }

          await this.deps.quotes.nextQuote(this.pollIntervalMs);
        } catch (e) {
          this.log.error('Error while monitoring position:', e);
          await sleep(this.retryDelayMs);
        }
      }
    } finally {
      this.monitoring = false;
    }

    this.log.info(`Monitoring stopped (state: ${this.state.kind})`);
  }

  private recordFailure(side: OrderSide, kind: string, reason: string): void {
    this.journal({ type: 'order_failed', symbol: this.settings.symbol, side, kind, reason });
  }

  private async deliver(text: string): Promise<void> {
    try {
      await this.deps.notifier.notify(text);
    } catch (e) {
      this.log.error('Notification delivery failed:', e);
    }
  }
}
