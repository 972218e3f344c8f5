import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy } from '@nestjs/microservices';
import { catchError, firstValueFrom, timeout } from 'rxjs';
import {
  KAFKA_SERVICE,
  OrderLifecycleMessage,
  OrderPattern,
} from '@app/common';
import { Order } from './order.entity';

/** Publishes order lifecycle events for downstream consumers. */
@Injectable()
export class OrderEventsPublisher {
  private readonly logger = new Logger(OrderEventsPublisher.name);

  constructor(@Inject(KAFKA_SERVICE) private readonly kafkaClient: ClientProxy) {}

  // the order is already committed; a broker outage must not undo it
  async publish(pattern: OrderPattern, order: Order): Promise<boolean> {
    const message: OrderLifecycleMessage = {
      orderId: order.id,
      userId: order.userId,
      status: order.status,
      totalPrice: order.totalPrice,
      timestamp: new Date().toISOString(),
    };

    try {
      await firstValueFrom(
        this.kafkaClient.emit(pattern, message).pipe(
          timeout(5000),
          catchError((error: unknown) => {
            this.logger.error(`Failed to emit ${pattern}: ${String(error)}`);
            throw error;
          }),
        ),
        { defaultValue: undefined },
      );
      return true;
    } catch (error) {
      this.logger.warn(
        `Order ${order.id} event ${pattern} was not published: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
