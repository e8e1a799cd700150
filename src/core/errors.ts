import type { OrderOutcome } from './types.js';

export type TradingErrorKind =
  | 'NoMarketData'
  | 'GatewayRejected'
  | 'ConfirmationTimeout'
  | 'InvalidState';

export const TRADING_STOPPED = 'Trading is stopped';

export class TradingError extends Error {
  constructor(
    readonly kind: TradingErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'TradingError';
  }
}

export type Failure = { ok: false; error: TradingError };
export type Result<T> = { ok: true; value: T } | Failure;

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const fail = (kind: TradingErrorKind, message: string): Failure => ({
  ok: false,
  error: new TradingError(kind, message),
});

export function outcomeError(outcome: Exclude<OrderOutcome, { status: 'filled' }>): TradingError {
  if (outcome.status === 'timeout') {
    return new TradingError('ConfirmationTimeout', 'No order confirmation received in time');
  }
  return new TradingError('GatewayRejected', `Order rejected: ${outcome.reason}`);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'unknown error';
}
