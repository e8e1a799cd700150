import { RestClientV5, WebsocketClient } from 'bybit-api';
import type { CategoryV5, OrderParamsV5 } from 'bybit-api';
import type { AppConfig } from '../config/env.js';
import { TRADING_CONFIG } from '../config/tradingConfig.js';
import { noopLogger, type Logger } from '../core/logging.js';
import { describeError } from '../core/errors.js';
import type {
  ConfirmationListener,
  OrderConfirmation,
  OrderGateway,
  OrderRequest,
} from '../core/types.js';
import { LocalOrderbook, orderbookTopic, parseOrderbookMessage } from '../market/orderbook.js';
import type { QuoteCache } from '../market/quoteCache.js';

export function createBybitClients(config: AppConfig['bybit']) {
  const rest = new RestClientV5({
    key: config.key,
    secret: config.secret,
    testnet: config.testnet,
  });

  // Public data only, no keys needed
  const ws = new WebsocketClient({
    market: 'v5',
    testnet: config.testnet,
  });

  return { rest, ws };
}

/** The part of RestClientV5 the gateway calls. */
export interface OrderSubmitter {
  submitOrder(params: OrderParamsV5): Promise<{
    retCode: number;
    retMsg: string;
    result: { orderId: string };
  }>;
}

/** Plain decimal notation; String() would give '1e-7' for small sizes. */
export function formatQuantity(quantity: number): string {
  return quantity.toFixed(10).replace(/\.?0+$/, '');
}

export function toOrderParams(request: OrderRequest, category: CategoryV5): OrderParamsV5 {
  return {
    category,
    symbol: request.symbol,
    side: request.side,
    orderType: 'Market',
    qty: formatQuantity(request.quantity),
    marketUnit: 'baseCoin',
    orderLinkId: request.id,
  };
}

/**
 * Market orders over the V5 REST API. The request id travels as `orderLinkId`,
 * and the exchange response is turned into a confirmation for that id.
 */
export class BybitOrderGateway implements OrderGateway {
  private readonly listeners = new Set<ConfirmationListener>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly client: OrderSubmitter,
    private readonly log: Logger = noopLogger,
    private readonly category: CategoryV5 = TRADING_CONFIG.feed.category
  ) {}

  onConfirmation(listener: ConfirmationListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  place(request: OrderRequest): void {
    const task = this.submit(request)
      .catch((err: unknown) => {
        this.log.error(`Error delivering ${request.side} order confirmation:`, err);
      })
      .finally(() => this.inFlight.delete(task));
    this.inFlight.add(task);
  }

  /** Waits for every submitted order to get its confirmation out. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async submit(request: OrderRequest): Promise<void> {
    let confirmation: OrderConfirmation;
    try {
      const response = await this.client.submitOrder(toOrderParams(request, this.category));
      this.log.debug('Order response:', response);

      confirmation =
        response.retCode === 0
          ? { requestId: request.id, success: true, orderId: response.result.orderId }
          : { requestId: request.id, success: false, reason: `[${response.retCode}] ${response.retMsg}` };
    } catch (e) {
      this.log.error(`Error submitting ${request.side} order:`, e);
      confirmation = { requestId: request.id, success: false, reason: describeError(e) };
    }

    this.listeners.forEach(listener => listener(confirmation));
  }
}

/** The subset of WebsocketClient the feed uses. */
export interface OrderbookSocket {
  on(event: 'update', listener: (message: unknown) => void): unknown;
  subscribeV5(topics: string | string[], category: CategoryV5): unknown;
  closeAll(force?: boolean): void;
}

export class BybitMarketFeed {
  private subscribed = false;
  private readonly book = new LocalOrderbook();

  constructor(
    private readonly ws: OrderbookSocket,
    private readonly quotes: QuoteCache,
    private readonly symbol: string,
    private readonly log: Logger = noopLogger,
    private readonly depth: number = TRADING_CONFIG.feed.orderbookDepth,
    private readonly category: CategoryV5 = TRADING_CONFIG.feed.category
  ) {
    this.ws.on('update', message => this.handleMessage(message));
  }

  async start(): Promise<void> {
    if (this.subscribed) return;

    const topic = orderbookTopic(this.symbol, this.depth);
    this.log.info('Subscribing to orderbook...', topic);
    await this.ws.subscribeV5(topic, this.category);
    this.subscribed = true;
    this.log.info(`Subscribed to order book for ${this.symbol}`);
  }

  stop(): void {
    this.ws.closeAll(true);
    this.subscribed = false;
    this.book.reset();
  }

  handleMessage(message: unknown): void {
    const update = parseOrderbookMessage(message);
    if (!update || update.symbol !== this.symbol) return;

    const top = this.book.apply(update);
    if (!top) {
      this.log.debug('Orderbook delta before snapshot, skipped');
      return;
    }
    this.quotes.update(top.bid, top.ask);
  }
}
