import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClientsModule, Transport } from '@nestjs/microservices';
import { TypeOrmModule } from '@nestjs/typeorm';
import { KAFKA_SERVICE } from '@app/common';
import { AuditModule } from '../audit/audit.module';
import { CatalogModule } from '../catalog/catalog.module';
import { CouponsModule } from '../coupons/coupons.module';
import { OrderEventsPublisher } from './order-events.publisher';
import { OrderItem } from './order-item.entity';
import { Order } from './order.entity';
import { OrdersController } from './orders.controller';
import { OrdersService } from './orders.service';
import { PaymentCompletedListener } from './payment-completed.listener';

@Module({
  imports: [
    TypeOrmModule.forFeature([Order, OrderItem]),
    ClientsModule.registerAsync([
      {
        name: KAFKA_SERVICE,
        inject: [ConfigService],
        useFactory: (config: ConfigService) => ({
          transport: Transport.KAFKA,
          options: {
            client: {
              clientId: 'back-office',
              brokers: config.get<string[]>('kafka.brokers', ['localhost:9092']),
            },
            producer: {
              allowAutoTopicCreation: true,
            },
            producerOnlyMode: true,
          },
        }),
      },
    ]),
    AuditModule,
    CatalogModule,
    CouponsModule,
  ],
  controllers: [OrdersController],
  providers: [OrdersService, OrderEventsPublisher, PaymentCompletedListener],
  exports: [OrdersService],
})
export class OrdersModule {}
