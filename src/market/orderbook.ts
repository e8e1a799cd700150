import { z } from 'zod';

// [price, size] as strings
const LevelSchema = z.tuple([z.string(), z.string()]);

const OrderbookMessageSchema = z.object({
  topic: z.string().startsWith('orderbook.'),
  type: z.enum(['snapshot', 'delta']).optional(),
  data: z.object({
    s: z.string(),
    b: z.array(LevelSchema),
    a: z.array(LevelSchema),
  }),
});

export type Level = [price: number, size: number];

export interface OrderbookUpdate {
  symbol: string;
  type: 'snapshot' | 'delta';
  bids: Level[];
  asks: Level[];
}

export interface TopOfBook {
  symbol: string;
  bid: number | undefined;
  ask: number | undefined;
}

const toLevels = (levels: [string, string][]): Level[] =>
  levels.flatMap(([price, size]): Level[] => {
    const p = parseFloat(price);
    const q = parseFloat(size);
    return Number.isFinite(p) && Number.isFinite(q) ? [[p, q]] : [];
  });

export function orderbookTopic(symbol: string, depth: number): string {
  return `orderbook.${depth}.${symbol}`;
}

/** Null for anything that is not an orderbook push (pongs, other topics). */
export function parseOrderbookMessage(message: unknown): OrderbookUpdate | null {
  const parsed = OrderbookMessageSchema.safeParse(message);
  if (!parsed.success) return null;

  const { s, b, a } = parsed.data.data;
  return {
    symbol: s,
    type: parsed.data.type ?? 'snapshot',
    bids: toLevels(b),
    asks: toLevels(a),
  };
}

/**
 * Book for one symbol, rebuilt from snapshots and patched by deltas.
 * A level with size 0 is a deletion.
 */
export class LocalOrderbook {
  private readonly bids = new Map<number, number>();
  private readonly asks = new Map<number, number>();
  private hasSnapshot = false;

  /** Returns the new top of book, or null while a delta has no snapshot to apply to. */
  apply(update: OrderbookUpdate): TopOfBook | null {
    if (update.type === 'snapshot') {
      this.bids.clear();
      this.asks.clear();
      this.hasSnapshot = true;
    } else if (!this.hasSnapshot) {
      return null;
    }

    applyLevels(this.bids, update.bids);
    applyLevels(this.asks, update.asks);

    return {
      symbol: update.symbol,
      bid: best(this.bids, Math.max),
      ask: best(this.asks, Math.min),
    };
  }

  reset(): void {
    this.bids.clear();
    this.asks.clear();
    this.hasSnapshot = false;
  }
}

function applyLevels(side: Map<number, number>, levels: Level[]): void {
  for (const [price, size] of levels) {
    if (size > 0) side.set(price, size);
    else side.delete(price);
  }
}

function best(side: Map<number, number>, pick: (...values: number[]) => number): number | undefined {
  return side.size === 0 ? undefined : pick(...side.keys());
}
