import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from './logging.js';

export type JournalEntry =
  | {
      type: 'position_opened';
      symbol: string;
      orderId: string;
      quantity: number;
      entryPrice: number;
      targetPrice: number;
    }
  | {
      type: 'position_closed';
      symbol: string;
      orderId: string;
      exitPrice: number;
      profitPercent: number;
    }
  | {
      type: 'order_failed';
      symbol: string;
      side: 'Buy' | 'Sell';
      kind: string;
      reason: string;
    };

export type Journal = (entry: JournalEntry) => void;

export const noopJournal: Journal = () => {};

// JSON lines, one trade event per line
export function createJournal(filePath: string, log: Logger): Journal {
  const dir = path.dirname(filePath);

  return entry => {
    try {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      const line = JSON.stringify({ ...entry, ts: Date.now() }) + '\n';
      fs.appendFile(filePath, line, err => {
        if (err) {
          log.error('Journal write failed:', err);
        }
      });
    } catch (e) {
      log.error('Journal unavailable:', e);
    }
  };
}
