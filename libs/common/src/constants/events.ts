export interface PaymentCompletedEvent {
  paymentId: string;
  orderId: string;
  transactionId: string | null;
}

export interface ReviewChangedEvent {
  reviewId: string;
  productId: string;
}

export interface OrderLifecycleMessage {
  orderId: string;
  userId: string;
  status: string;
  totalPrice: number;
  timestamp: string;
}
