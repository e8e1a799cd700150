import { describe, expect, it } from 'vitest';
import {
  LocalOrderbook,
  orderbookTopic,
  parseOrderbookMessage,
  type OrderbookUpdate,
} from '../../src/market/orderbook.js';

const message = (b: [string, string][], a: [string, string][], s = 'BTCUSDT') => ({
  topic: `orderbook.1.${s}`,
  type: 'snapshot',
  ts: 1_700_000_000_000,
  data: { s, b, a, u: 1, seq: 10 },
});

const update = (
  type: OrderbookUpdate['type'],
  bids: [number, number][],
  asks: [number, number][]
): OrderbookUpdate => ({ symbol: 'BTCUSDT', type, bids, asks });

describe('parseOrderbookMessage', () => {
  it('converts every level to numbers', () => {
    const parsed = parseOrderbookMessage(
      message(
        [
          ['64000.5', '0.3'],
          ['63999', '1'],
        ],
        [['64001.25', '0.2']]
      )
    );

    expect(parsed).toEqual({
      symbol: 'BTCUSDT',
      type: 'snapshot',
      bids: [
        [64000.5, 0.3],
        [63999, 1],
      ],
      asks: [[64001.25, 0.2]],
    });
  });

  it('treats a push without a type as a snapshot', () => {
    const untyped = {
      topic: 'orderbook.1.BTCUSDT',
      data: { s: 'BTCUSDT', b: [['10', '1']], a: [['11', '1']] },
    };

    expect(parseOrderbookMessage(untyped)?.type).toBe('snapshot');
  });

  it('drops levels whose price or size is not a number', () => {
    const parsed = parseOrderbookMessage(
      message(
        [
          ['abc', '1'],
          ['9', 'x'],
        ],
        [['10', '1']]
      )
    );

    expect(parsed?.bids).toEqual([]);
    expect(parsed?.asks).toEqual([[10, 1]]);
  });

  it('ignores messages that are not orderbook pushes', () => {
    expect(parseOrderbookMessage({ op: 'pong', success: true })).toBeNull();
    expect(parseOrderbookMessage({ topic: 'publicTrade.BTCUSDT', data: [] })).toBeNull();
    expect(parseOrderbookMessage('not json')).toBeNull();
  });

  it('builds the subscription topic', () => {
    expect(orderbookTopic('ETHUSDT', 50)).toBe('orderbook.50.ETHUSDT');
  });
});

describe('LocalOrderbook', () => {
  it('takes the best price of each side from a snapshot', () => {
    const book = new LocalOrderbook();

    const top = book.apply(
      update(
        'snapshot',
        [
          [99, 1],
          [100, 2],
        ],
        [
          [102, 1],
          [101, 3],
        ]
      )
    );

    expect(top).toEqual({ symbol: 'BTCUSDT', bid: 100, ask: 101 });
  });

  it('skips zero-size levels in a snapshot', () => {
    const book = new LocalOrderbook();

    const top = book.apply(update('snapshot', [[100, 0]], [[101, 1]]));

    expect(top).toEqual({ symbol: 'BTCUSDT', bid: undefined, ask: 101 });
  });

  it('removes zero-size levels and adds new ones from a delta', () => {
    const book = new LocalOrderbook();
    book.apply(update('snapshot', [[100, 1]], [[103, 1]]));

    const top = book.apply(
      update(
        'delta',
        [
          [100, 0],
          [101, 2],
        ],
        [[102, 1]]
      )
    );

    expect(top).toEqual({ symbol: 'BTCUSDT', bid: 101, ask: 102 });
  });

  it('keeps the other side when a delta touches only one', () => {
    const book = new LocalOrderbook();
    book.apply(update('snapshot', [[100, 1]], [[101, 1]]));

    const top = book.apply(update('delta', [[100.5, 1]], []));

    expect(top).toEqual({ symbol: 'BTCUSDT', bid: 100.5, ask: 101 });
  });

  it('replaces the whole book on the next snapshot', () => {
    const book = new LocalOrderbook();
    book.apply(update('snapshot', [[100, 1]], [[101, 1]]));

    const top = book.apply(update('snapshot', [[90, 1]], [[91, 1]]));

    expect(top).toEqual({ symbol: 'BTCUSDT', bid: 90, ask: 91 });
  });

  it('skips deltas until the first snapshot, and again after a reset', () => {
    const book = new LocalOrderbook();

    expect(book.apply(update('delta', [[100, 1]], [[101, 1]]))).toBeNull();

    book.apply(update('snapshot', [[100, 1]], [[101, 1]]));
    book.reset();

    expect(book.apply(update('delta', [[100, 1]], [[101, 1]]))).toBeNull();
  });
});
