import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { FindOptionsWhere, Repository } from 'typeorm';
import { v4 as uuid } from 'uuid';
import {
  CreatePaymentDto,
  DOMAIN_EVENTS,
  PAYMENT_TRANSITIONS,
  PaymentCompletedEvent,
  PaymentQueryDto,
  PaymentResponseDto,
  PaymentStatus,
  PaymentWebhookDto,
  canTransition,
} from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { Order } from '../orders/order.entity';
import { PaymentGatewayClient } from './payment-gateway.client';
import { Payment } from './payment.entity';
import { WebhookLog } from './webhook-log.entity';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

interface TransitionDetails {
  transactionId?: string;
  reason?: string;
  actorId?: string;
}

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
    @InjectRepository(WebhookLog)
    private readonly webhookLogRepository: Repository<WebhookLog>,
    @InjectRepository(Order)
    private readonly orderRepository: Repository<Order>,
    private readonly gatewayClient: PaymentGatewayClient,
    private readonly auditLogService: AuditLogService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async create(dto: CreatePaymentDto, actorId?: string): Promise<Payment> {
    const order = await this.orderRepository.findOneBy({ id: dto.orderId });
    if (!order) {
      throw new NotFoundException(`Order ${dto.orderId} not found`);
    }
    if (order.status !== 'pending') {
      throw new ConflictException(
        `Order ${order.id} is ${order.status} and cannot take a payment`,
      );
    }

    const payment = await this.paymentRepository.save(
      this.paymentRepository.create({
        orderId: order.id,
        amount: order.totalPrice,
        method: dto.method,
        status: 'pending',
        reference: uuid(),
      }),
    );

    await this.auditLogService.record({
      actorId,
      action: 'create',
      entityType: 'payment',
      entityId: payment.id,
      changes: { orderId: order.id, amount: payment.amount, method: payment.method },
    });
    this.logger.log(`Payment ${payment.reference} opened for order ${order.id}`);
    return payment;
  }

  async findAll(query: PaymentQueryDto = {}): Promise<Payment[]> {
    const where: FindOptionsWhere<Payment> = {};
    if (query.orderId) where.orderId = query.orderId;
    if (query.status) where.status = query.status;
    return this.paymentRepository.find({ where, order: { createdAt: 'DESC' } });
  }

  async findOne(id: string): Promise<Payment> {
    const payment = await this.paymentRepository.findOneBy({ id });
    if (!payment) {
      throw new NotFoundException(`Payment ${id} not found`);
    }
    return payment;
  }

  async complete(
    id: string,
    transactionId?: string,
    actorId?: string,
  ): Promise<Payment> {
    const payment = await this.findOne(id);
    return this.transition(payment, 'completed', { transactionId, actorId });
  }

  async fail(id: string, reason: string, actorId?: string): Promise<Payment> {
    const payment = await this.findOne(id);
    return this.transition(payment, 'failed', { reason, actorId });
  }

  /**
   * Logs a gateway notification and applies it. The log row is written first
   * so even malformed or unmatched deliveries are kept.
   */
  async handleWebhook(provider: string, body: unknown): Promise<WebhookLog> {
    const payload: Record<string, unknown> = isPlainObject(body) ? body : { raw: body };
    const log = await this.webhookLogRepository.save(
      this.webhookLogRepository.create({
        provider: provider.slice(0, 50),
        eventType:
          typeof payload.event === 'string' ? payload.event.slice(0, 100) : 'unknown',
        payload,
        processed: false,
        error: null,
      }),
    );

    const dto = plainToInstance(PaymentWebhookDto, payload);
    const errors = await validate(dto);
    if (errors.length > 0) {
      const message = errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; ');
      await this.closeLog(log, `Invalid payload: ${message}`);
      throw new BadRequestException(`Invalid webhook payload: ${message}`);
    }

    try {
      const payment = await this.findByGatewayIds(dto);
      const applied = await this.transition(payment, dto.status, {
        transactionId: dto.transactionId,
        reason: dto.message ?? 'Declined by gateway',
      });
      this.logger.log(
        `Webhook ${log.id} from ${provider}: payment ${applied.reference} is ${applied.status}`,
      );
      return this.closeLog(log, null);
    } catch (error) {
      if (error instanceof NotFoundException || error instanceof ConflictException) {
        this.logger.warn(`Webhook ${log.id} from ${provider} not applied: ${error.message}`);
        return this.closeLog(log, error.message);
      }
      await this.closeLog(log, error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  async listWebhookLogs(provider?: string): Promise<WebhookLog[]> {
    return this.webhookLogRepository.find({
      where: provider ? { provider } : {},
      order: { receivedAt: 'DESC' },
    });
  }

  /** Pulls the gateway's view of a pending payment and applies it. */
  async syncWithGateway(id: string, actorId?: string): Promise<PaymentResponseDto> {
    const payment = await this.findOne(id);
    if (payment.status !== 'pending') {
      return this.toResponse(payment, 'Payment already settled');
    }

    const remote = await this.gatewayClient.fetchStatus(payment.reference);
    if (remote.status === 'pending') {
      return this.toResponse(payment, remote.message ?? 'Still pending at gateway');
    }

    const updated = await this.transition(payment, remote.status, {
      transactionId: remote.transactionId,
      reason: remote.message ?? 'Declined by gateway',
      actorId,
    });
    return this.toResponse(updated, remote.message);
  }

  private async transition(
    payment: Payment,
    to: PaymentStatus,
    details: TransitionDetails,
  ): Promise<Payment> {
    if (payment.status === to) {
      return payment;
    }
    if (!canTransition(PAYMENT_TRANSITIONS, payment.status, to)) {
      throw new ConflictException(
        `Payment ${payment.id} is ${payment.status} and cannot become ${to}`,
      );
    }

    if (details.transactionId && details.transactionId !== payment.transactionId) {
      const clash = await this.paymentRepository.findOneBy({
        transactionId: details.transactionId,
      });
      if (clash) {
        throw new ConflictException(
          `Transaction ${details.transactionId} already belongs to payment ${clash.id}`,
        );
      }
    }

    const from = payment.status;
    const changes = {
      status: to,
      transactionId: details.transactionId ?? payment.transactionId,
      completedAt: to === 'completed' ? new Date() : payment.completedAt,
      failureReason: to === 'completed' ? null : (details.reason ?? null),
    };

    // only the writer that still sees the old status wins
    const result = await this.paymentRepository
      .createQueryBuilder()
      .update(Payment)
      .set(changes)
      .where('id = :id', { id: payment.id })
      .andWhere('status = :from', { from })
      .execute();
    if (!result.affected) {
      const current = await this.findOne(payment.id);
      if (current.status === to) {
        return current;
      }
      throw new ConflictException(
        `Payment ${payment.id} is ${current.status} and cannot become ${to}`,
      );
    }
    const saved = Object.assign(payment, changes);

    await this.auditLogService.record({
      actorId: details.actorId,
      action: 'status_change',
      entityType: 'payment',
      entityId: saved.id,
      changes: { status: { from, to } },
    });
    this.logger.log(`Payment ${saved.reference} ${from} -> ${to}`);

    if (to === 'completed') {
      const event: PaymentCompletedEvent = {
        paymentId: saved.id,
        orderId: saved.orderId,
        transactionId: saved.transactionId,
      };
      await this.eventEmitter.emitAsync(DOMAIN_EVENTS.PAYMENT_COMPLETED, event);
    }
    return saved;
  }

  private async findByGatewayIds(dto: PaymentWebhookDto): Promise<Payment> {
    const where: FindOptionsWhere<Payment>[] = [];
    if (dto.reference) where.push({ reference: dto.reference });
    if (dto.transactionId) where.push({ transactionId: dto.transactionId });
    if (where.length === 0) {
      throw new NotFoundException('Webhook names neither reference nor transactionId');
    }

    const payment = await this.paymentRepository.findOne({ where });
    if (!payment) {
      throw new NotFoundException(
        `No payment matches reference ${dto.reference ?? '-'} / transaction ${dto.transactionId ?? '-'}`,
      );
    }
    return payment;
  }

  private async closeLog(log: WebhookLog, error: string | null): Promise<WebhookLog> {
    log.processed = error === null;
    log.error = error?.slice(0, 500) ?? null;
    return this.webhookLogRepository.save(log);
  }

  private toResponse(payment: Payment, message?: string): PaymentResponseDto {
    return {
      success: payment.status === 'completed',
      paymentId: payment.id,
      status: payment.status,
      transactionId: payment.transactionId,
      message,
    };
  }
}
