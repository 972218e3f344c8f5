import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { DOMAIN_EVENTS, PaymentCompletedEvent } from '@app/common';
import { OrdersService } from './orders.service';

@Injectable()
export class PaymentCompletedListener {
  private readonly logger = new Logger(PaymentCompletedListener.name);

  constructor(private readonly ordersService: OrdersService) {}

  @OnEvent(DOMAIN_EVENTS.PAYMENT_COMPLETED)
  async handlePaymentCompleted(event: PaymentCompletedEvent): Promise<void> {
    const order = await this.ordersService.completeForPayment(
      event.orderId,
      event.paymentId,
    );
    if (order) {
      this.logger.log(
        `Payment ${event.paymentId} settled order ${order.id} (${order.status})`,
      );
    }
  }
}
