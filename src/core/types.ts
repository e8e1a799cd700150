export interface Quote {
  bid: number;
  ask: number;
  updatedAt: number;
}

export type OrderSide = 'Buy' | 'Sell';

export interface OrderRequest {
  readonly id: string;
  readonly side: OrderSide;
  readonly symbol: string;
  readonly quantity: number;
}

export type OrderSpec = Omit<OrderRequest, 'id'>;

export interface OrderConfirmation {
  requestId: string;
  success: boolean;
  orderId?: string;
  reason?: string;
}

export type OrderOutcome =
  | { status: 'filled'; requestId: string; orderId: string }
  | { status: 'rejected'; requestId: string; reason: string }
  | { status: 'timeout'; requestId: string };

export type ConfirmationListener = (confirmation: OrderConfirmation) => void;

export interface OrderGateway {
  /** Sends the order; the outcome arrives later through `onConfirmation`. */
  place(request: OrderRequest): void | Promise<void>;
  onConfirmation(listener: ConfirmationListener): () => void;
}

export interface NotificationSink {
  /** Must not reject: delivery failures are the sink's to log. */
  notify(text: string): Promise<void>;
}

export interface Position {
  orderId: string;
  symbol: string;
  quantity: number;
  entryPrice: number;
  targetPrice: number;
  openedAt: number;
}

export interface ClosedPosition extends Position {
  closeOrderId: string;
  exitPrice: number;
  profitPercent: number;
  closedAt: number;
}

export type PositionState =
  | { kind: 'idle' }
  | { kind: 'opening' }
  | { kind: 'open'; position: Position }
  | { kind: 'closing'; position: Position };

export type StatusReport =
  | { state: 'idle' }
  | { state: 'opening' }
  | {
      state: 'open' | 'closing';
      position: Position;
      currentBid: number | null;
      unrealizedPercent: number | null;
    };
