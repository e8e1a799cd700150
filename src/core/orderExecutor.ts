import { randomUUID } from 'node:crypto';
import type {
  OrderConfirmation,
  OrderGateway,
  OrderOutcome,
  OrderRequest,
  OrderSpec,
} from './types.js';
import { describeError } from './errors.js';
import { noopLogger, type Logger } from './logging.js';

interface PendingOrder {
  request: OrderRequest;
  settle: (outcome: OrderOutcome) => void;
}

/**
 * Sends market orders through the gateway and waits for the confirmation that
 * carries the same request id, or for the timeout.
 *
 * A timed-out order is forgotten here even though it may still fill on the
 * exchange; a confirmation that arrives afterwards is only logged.
 */
export class OrderExecutor {
  private readonly pending = new Map<string, PendingOrder>();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly gateway: OrderGateway,
    private readonly log: Logger = noopLogger,
    private readonly nextId: () => string = randomUUID
  ) {
    this.unsubscribe = gateway.onConfirmation(c => this.handleConfirmation(c));
  }

  execute(spec: OrderSpec, timeoutMs: number): Promise<OrderOutcome> {
    const request: OrderRequest = Object.freeze({ ...spec, id: this.nextId() });

    return new Promise<OrderOutcome>(resolve => {
      const timer = setTimeout(() => {
        this.log.error(`Timeout waiting for ${request.side} confirmation`, { id: request.id });
        settle({ status: 'timeout', requestId: request.id });
      }, timeoutMs);

      const settle = (outcome: OrderOutcome) => {
        if (!this.pending.delete(request.id)) return;
        clearTimeout(timer);
        resolve(outcome);
      };

      // Registered before sending so a synchronous confirmation is not lost
      this.pending.set(request.id, { request, settle });

      this.log.info(`Placing ${request.side} ${request.quantity} ${request.symbol}`, {
        id: request.id,
      });
      this.dispatch(request).catch((err: unknown) => {
        this.log.error(`Error placing ${request.side} order:`, err);
        settle({ status: 'rejected', requestId: request.id, reason: describeError(err) });
      });
    });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  dispose(): void {
    this.unsubscribe();
  }

  private async dispatch(request: OrderRequest): Promise<void> {
    await this.gateway.place(request);
  }

  private handleConfirmation(confirmation: OrderConfirmation): void {
    const entry = this.pending.get(confirmation.requestId);
    if (!entry) {
      this.log.warn('Confirmation for unknown or abandoned order request', confirmation);
      return;
    }

    const { request, settle } = entry;
    if (confirmation.success && confirmation.orderId) {
      this.log.info(`${request.side} order filled`, { id: request.id, orderId: confirmation.orderId });
      settle({ status: 'filled', requestId: request.id, orderId: confirmation.orderId });
      return;
    }

    const reason = confirmation.reason || (confirmation.success ? 'missing order id' : 'unknown reason');
    this.log.error(`${request.side} order rejected:`, reason);
    settle({ status: 'rejected', requestId: request.id, reason });
  }
}
