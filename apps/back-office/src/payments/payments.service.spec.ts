import {
  BadRequestException,
  ConflictException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { KAFKA_SERVICE } from '@app/common';
import { Order } from '../orders/order.entity';
import { OrdersModule } from '../orders/orders.module';
import { OrdersService } from '../orders/orders.service';
import {
  RecordingClientProxy,
  seedCategory,
  seedProduct,
  seedUser,
  testingInfrastructure,
} from '../testing/test-database';
import { PaymentGatewayClient } from './payment-gateway.client';
import { Payment } from './payment.entity';
import { PaymentsModule } from './payments.module';
import { PaymentsService } from './payments.service';

describe('PaymentsService', () => {
  let moduleRef: TestingModule;
  let payments: PaymentsService;
  let orders: OrdersService;
  let kafka: RecordingClientProxy;
  let gateway: { fetchStatus: jest.Mock };
  let order: Order;
  let payment: Payment;

  beforeEach(async () => {
    kafka = new RecordingClientProxy();
    gateway = { fetchStatus: jest.fn() };
    moduleRef = await Test.createTestingModule({
      imports: [...testingInfrastructure(), OrdersModule, PaymentsModule],
    })
      .overrideProvider(KAFKA_SERVICE)
      .useValue(kafka)
      .overrideProvider(PaymentGatewayClient)
      .useValue(gateway)
      .compile();
    // registers the @OnEvent listeners
    await moduleRef.init();

    payments = moduleRef.get(PaymentsService);
    orders = moduleRef.get(OrdersService);

    const dataSource = moduleRef.get(DataSource);
    const alice = await seedUser(dataSource);
    const kitchen = await seedCategory(dataSource);
    const mug = await seedProduct(dataSource, kitchen.id, { price: 12.5 });
    order = await orders.create({
      userId: alice.id,
      items: [{ productId: mug.id, quantity: 2 }],
    });
    payment = await payments.create({ orderId: order.id, method: 'card' });
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  const orderStatus = async (): Promise<string> =>
    (await orders.findOne(order.id)).status;

  describe('create', () => {
    it('opens a pending payment for the order total', () => {
      expect(payment).toMatchObject({
        orderId: order.id,
        amount: 25,
        method: 'card',
        status: 'pending',
        transactionId: null,
      });
      expect(payment.reference).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it('refuses orders that are no longer pending', async () => {
      await orders.cancel(order.id);

      await expect(
        payments.create({ orderId: order.id, method: 'paypal' }),
      ).rejects.toBeInstanceOf(ConflictException);
    });
  });

  describe('complete and fail', () => {
    it('completing a payment completes its order', async () => {
      const completed = await payments.complete(payment.id, 'txn-1');

      expect(completed.status).toBe('completed');
      expect(completed.transactionId).toBe('txn-1');
      expect(completed.completedAt).toBeInstanceOf(Date);
      expect(await orderStatus()).toBe('completed');
      expect(kafka.patterns()).toEqual(['order_created', 'order_completed']);
    });

    it('a failed payment leaves the order pending and cannot complete later', async () => {
      const failed = await payments.fail(payment.id, 'Card declined');

      expect(failed.status).toBe('failed');
      expect(failed.failureReason).toBe('Card declined');
      expect(await orderStatus()).toBe('pending');
      await expect(payments.complete(payment.id)).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('completing twice is a no-op', async () => {
      await payments.complete(payment.id);
      const again = await payments.complete(payment.id);

      expect(again.status).toBe('completed');
      expect(kafka.patterns()).toEqual(['order_created', 'order_completed']);
    });

    it('refuses a transaction id that belongs to another payment', async () => {
      const second = await payments.create({ orderId: order.id, method: 'paypal' });
      await payments.complete(payment.id, 'txn-1');

      await expect(payments.complete(second.id, 'txn-1')).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('filters the listing by status', async () => {
      await payments.fail(payment.id, 'Card declined');

      expect(await payments.findAll({ status: 'pending' })).toEqual([]);
      expect(
        (await payments.findAll({ orderId: order.id })).map(({ id }) => id),
      ).toEqual([payment.id]);
    });
  });

  describe('handleWebhook', () => {
    it('applies a completion and logs it as processed', async () => {
      const body = {
        event: 'payment.succeeded',
        reference: payment.reference,
        transactionId: 'gw-42',
        status: 'completed',
      };

      const log = await payments.handleWebhook('stripe', body);

      expect(log).toMatchObject({
        provider: 'stripe',
        eventType: 'payment.succeeded',
        payload: body,
        processed: true,
        error: null,
      });
      const stored = await payments.findOne(payment.id);
      expect(stored.status).toBe('completed');
      expect(stored.transactionId).toBe('gw-42');
      expect(await orderStatus()).toBe('completed');
    });

    it('accepts a repeated delivery without changing anything', async () => {
      const body = {
        event: 'payment.succeeded',
        reference: payment.reference,
        status: 'completed',
      };

      await payments.handleWebhook('stripe', body);
      const repeat = await payments.handleWebhook('stripe', body);

      expect(repeat.processed).toBe(true);
      expect(await payments.listWebhookLogs('stripe')).toHaveLength(2);
      expect(kafka.patterns()).toEqual(['order_created', 'order_completed']);
    });

    it('finds the payment by transaction id', async () => {
      await payments.complete(payment.id, 'gw-7');

      const log = await payments.handleWebhook('stripe', {
        event: 'payment.succeeded',
        transactionId: 'gw-7',
        status: 'completed',
      });

      expect(log.processed).toBe(true);
    });

    it('logs an illegal transition as an error and leaves the payment alone', async () => {
      await payments.complete(payment.id);

      const log = await payments.handleWebhook('stripe', {
        event: 'payment.failed',
        reference: payment.reference,
        status: 'failed',
      });

      expect(log.processed).toBe(false);
      expect(log.error).toBe(
        `Payment ${payment.id} is completed and cannot become failed`,
      );
      expect((await payments.findOne(payment.id)).status).toBe('completed');
    });

    it('logs deliveries for unknown payments', async () => {
      const log = await payments.handleWebhook('adyen', {
        event: 'payment.failed',
        reference: 'unknown-ref',
        status: 'failed',
      });

      expect(log.processed).toBe(false);
      expect(log.error).toBe('No payment matches reference unknown-ref / transaction -');
    });

    it('keeps malformed deliveries in the log and rejects them', async () => {
      const body = { event: 'payment.refunded', reference: payment.reference, status: 'refunded' };

      await expect(payments.handleWebhook('stripe', body)).rejects.toBeInstanceOf(
        BadRequestException,
      );

      const [log] = await payments.listWebhookLogs('stripe');
      expect(log.payload).toEqual(body);
      expect(log.processed).toBe(false);
      expect(log.error).toMatch(/^Invalid payload: /);
      expect((await payments.findOne(payment.id)).status).toBe('pending');
    });
  });

  describe('malformed deliveries', () => {
    it('logs a null queue message before rejecting it', async () => {
      await expect(payments.handleWebhook('queue', null)).rejects.toBeInstanceOf(
        BadRequestException,
      );

      const [log] = await payments.listWebhookLogs('queue');
      expect(log).toMatchObject({
        eventType: 'unknown',
        payload: { raw: null },
        processed: false,
      });
    });

    it('trims provider and event names to their column widths', async () => {
      const log = await payments.handleWebhook('p'.repeat(60), {
        event: 'e'.repeat(120),
        reference: payment.reference,
        status: 'completed',
      });

      expect(log.provider).toBe('p'.repeat(50));
      expect(log.eventType).toBe('e'.repeat(100));
      expect(log.processed).toBe(true);
    });
  });

  describe('concurrent transitions', () => {
    it('does not let a stale failure overwrite a completion', async () => {
      const stale = await payments.findOne(payment.id);
      await payments.complete(payment.id, 'txn-1');
      jest.spyOn(payments, 'findOne').mockResolvedValueOnce(stale);

      await expect(payments.fail(payment.id, 'Card declined')).rejects.toThrow(
        `Payment ${payment.id} is completed and cannot become failed`,
      );
      const stored = await payments.findOne(payment.id);
      expect(stored.status).toBe('completed');
      expect(stored.failureReason).toBeNull();
    });

    it('treats a stale repeat of the same outcome as settled', async () => {
      const stale = await payments.findOne(payment.id);
      await payments.complete(payment.id);
      jest.spyOn(payments, 'findOne').mockResolvedValueOnce(stale);

      const again = await payments.complete(payment.id);

      expect(again.status).toBe('completed');
      expect(kafka.patterns()).toEqual(['order_created', 'order_completed']);
    });
  });

  describe('syncWithGateway', () => {
    it('applies the status the gateway reports', async () => {
      gateway.fetchStatus.mockResolvedValue({
        reference: payment.reference,
        status: 'completed',
        transactionId: 'gw-1',
      });

      const response = await payments.syncWithGateway(payment.id);

      expect(gateway.fetchStatus).toHaveBeenCalledWith(payment.reference);
      expect(response).toEqual({
        success: true,
        paymentId: payment.id,
        status: 'completed',
        transactionId: 'gw-1',
        message: undefined,
      });
      expect(await orderStatus()).toBe('completed');
    });

    it('reports a payment the gateway still holds', async () => {
      gateway.fetchStatus.mockResolvedValue({
        reference: payment.reference,
        status: 'pending',
      });

      const response = await payments.syncWithGateway(payment.id);

      expect(response.success).toBe(false);
      expect(response.status).toBe('pending');
      expect(response.message).toBe('Still pending at gateway');
    });

    it('does not ask the gateway about settled payments', async () => {
      await payments.fail(payment.id, 'Card declined');

      const response = await payments.syncWithGateway(payment.id);

      expect(gateway.fetchStatus).not.toHaveBeenCalled();
      expect(response.message).toBe('Payment already settled');
    });
  });
});
