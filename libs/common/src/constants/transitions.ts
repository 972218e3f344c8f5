import { OrderStatus, PaymentStatus } from './choices';

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export const ORDER_TRANSITIONS: TransitionTable<OrderStatus> = {
  pending: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

export const PAYMENT_TRANSITIONS: TransitionTable<PaymentStatus> = {
  pending: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition<S extends string>(
  table: TransitionTable<S>,
  from: S,
  to: S,
): boolean {
  return table[from].includes(to);
}
