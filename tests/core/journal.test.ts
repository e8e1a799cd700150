import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createJournal } from '../../src/core/journal.js';
import { noopLogger } from '../../src/core/logging.js';

describe('createJournal', () => {
  const dirs: string[] = [];

  afterEach(() => {
    dirs.splice(0).forEach(dir => fs.rmSync(dir, { recursive: true, force: true }));
  });

  it('appends one JSON object per entry', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'journal-'));
    dirs.push(dir);
    const file = path.join(dir, 'nested', 'trades.log');
    const journal = createJournal(file, noopLogger);

    journal({ type: 'order_failed', symbol: 'BTCUSDT', side: 'Buy', kind: 'ConfirmationTimeout', reason: 'late' });
    journal({ type: 'position_closed', symbol: 'BTCUSDT', orderId: 'Y', exitPrice: 103, profitPercent: 2 });

    await vi.waitFor(() => {
      expect(fs.readFileSync(file, 'utf-8').trim().split('\n')).toHaveLength(2);
    });

    const [first, second] = fs
      .readFileSync(file, 'utf-8')
      .trim()
      .split('\n')
      .map(line => JSON.parse(line) as Record<string, unknown>);
    expect(first).toMatchObject({ type: 'order_failed', kind: 'ConfirmationTimeout', reason: 'late' });
    expect(typeof first?.ts).toBe('number');
    expect(second).toMatchObject({ type: 'position_closed', orderId: 'Y', exitPrice: 103 });
  });
});
