import type { Quote } from '../core/types.js';
import { noopLogger, type Logger } from '../core/logging.js';

type Waiter = (quote: Quote) => void;

const isValidPrice = (value: number | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

/** Latest top of book for one symbol. Written by the feed only. */
export class QuoteCache {
  private quote: Quote | null = null;
  private waiters: Waiter[] = [];

  constructor(
    private readonly log: Logger = noopLogger,
    private readonly now: () => number = Date.now
  ) {}

  update(bid: number | undefined, ask: number | undefined): boolean {
    if (!isValidPrice(bid) || !isValidPrice(ask)) {
      this.log.warn('Incomplete orderbook data received', { bid, ask });
      return false;
    }

    const quote: Quote = { bid, ask, updatedAt: this.now() };
    this.quote = quote;
    this.log.debug('Orderbook data received:', { bid, ask });

    const waiting = this.waiters;
    this.waiters = [];
    waiting.forEach(wake => wake(quote));
    return true;
  }

  read(): Quote | null {
    return this.quote;
  }

  /** Resolves with the next accepted quote, or null once `timeoutMs` passes. */
  nextQuote(timeoutMs: number): Promise<Quote | null> {
    return new Promise(resolve => {
      const waiter: Waiter = quote => {
        clearTimeout(timer);
        resolve(quote);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  get waiterCount(): number {
    return this.waiters.length;
  }
}
