import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { CircuitBreakerModule } from '../circuit-breaker/circuit-breaker.module';
import { Order } from '../orders/order.entity';
import { PaymentGatewayClient } from './payment-gateway.client';
import { Payment } from './payment.entity';
import { PaymentsController } from './payments.controller';
import { PaymentsService } from './payments.service';
import { WebhookLog } from './webhook-log.entity';

@Module({
  imports: [
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 5,
    }),
    TypeOrmModule.forFeature([Payment, WebhookLog, Order]),
    CircuitBreakerModule,
    AuditModule,
  ],
  controllers: [PaymentsController],
  providers: [PaymentsService, PaymentGatewayClient],
})
export class PaymentsModule {}
