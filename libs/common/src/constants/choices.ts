export const USER_ROLES = ['admin', 'moderator', 'customer'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const ORDER_STATUSES = ['pending', 'completed', 'cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_STATUSES = ['pending', 'completed', 'failed'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_METHODS = [
  'card',
  'paypal',
  'bank_transfer',
  'cash_on_delivery',
] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const STOCK_REASONS = [
  'restock',
  'adjustment',
  'order',
  'order_cancelled',
] as const;
export type StockReason = (typeof STOCK_REASONS)[number];

export const AUDIT_ACTIONS = [
  'create',
  'update',
  'delete',
  'status_change',
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];
