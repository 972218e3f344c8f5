export const PAYMENT_PATTERNS = {
  PAYMENT_CALLBACK: 'payment_callback',
} as const;

export const ORDER_PATTERNS = {
  ORDER_CREATED: 'order_created',
  ORDER_COMPLETED: 'order_completed',
  ORDER_CANCELLED: 'order_cancelled',
} as const;

export type OrderPattern = (typeof ORDER_PATTERNS)[keyof typeof ORDER_PATTERNS];

/** In-process events dispatched through the event emitter. */
export const DOMAIN_EVENTS = {
  PAYMENT_COMPLETED: 'payment.completed',
  REVIEW_CHANGED: 'review.changed',
} as const;

export const KAFKA_SERVICE = 'KAFKA_SERVICE';
