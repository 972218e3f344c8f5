import {
  BadRequestException,
  ConflictException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { throwError } from 'rxjs';
import { DataSource } from 'typeorm';
import { KAFKA_SERVICE } from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { CartItem } from '../cart/cart-item.entity';
import { InventoryService } from '../catalog/inventory.service';
import { Product } from '../catalog/product.entity';
import {
  RecordingClientProxy,
  seedCategory,
  seedCoupon,
  seedProduct,
  seedUser,
  testingInfrastructure,
} from '../testing/test-database';
import { User } from '../users/user.entity';
import { Order } from './order.entity';
import { OrdersModule } from './orders.module';
import { OrdersService } from './orders.service';

describe('OrdersService', () => {
  let moduleRef: TestingModule;
  let orders: OrdersService;
  let inventory: InventoryService;
  let dataSource: DataSource;
  let kafka: RecordingClientProxy;
  let alice: User;
  let mug: Product;
  let plate: Product;

  const stockOf = async (product: Product): Promise<number> =>
    (await dataSource.getRepository(Product).findOneByOrFail({ id: product.id }))
      .quantity;

  const fillCart = async (lines: [Product, number][]): Promise<void> => {
    const repository = dataSource.getRepository(CartItem);
    for (const [product, quantity] of lines) {
      await repository.save(
        repository.create({ userId: alice.id, productId: product.id, quantity }),
      );
    }
  };

  beforeEach(async () => {
    kafka = new RecordingClientProxy();
    moduleRef = await Test.createTestingModule({
      imports: [...testingInfrastructure(), OrdersModule],
    })
      .overrideProvider(KAFKA_SERVICE)
      .useValue(kafka)
      .compile();

    orders = moduleRef.get(OrdersService);
    inventory = moduleRef.get(InventoryService);
    dataSource = moduleRef.get(DataSource);

    alice = await seedUser(dataSource);
    const kitchen = await seedCategory(dataSource);
    mug = await seedProduct(dataSource, kitchen.id, { price: 19.99, quantity: 10 });
    plate = await seedProduct(dataSource, kitchen.id, {
      sku: 'PLATE-1',
      price: 11,
      quantity: 4,
    });
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('checkout', () => {
    it('prices the cart, applies the coupon and takes the stock', async () => {
      const coupon = await seedCoupon(dataSource);
      await fillCart([
        [mug, 3],
        [plate, 1],
      ]);

      const order = await orders.checkout({ userId: alice.id, couponCode: 'welcome10' });

      expect(order).toMatchObject({
        status: 'pending',
        subtotal: 70.97,
        discount: 7.1,
        totalPrice: 63.87,
        discountPercent: 10,
        couponId: coupon.id,
        shippingAddress: '1 Market Street',
      });
      expect(await stockOf(mug)).toBe(7);
      expect(await stockOf(plate)).toBe(3);

      const history = await inventory.stockHistory(mug.id);
      expect(history.map((row) => [row.change, row.reason, row.reference])).toEqual([
        [-3, 'order', order.id],
      ]);
      expect(await dataSource.getRepository(CartItem).countBy({ userId: alice.id })).toBe(0);
    });

    it('keeps the unit price of each line', async () => {
      await fillCart([
        [mug, 2],
        [plate, 1],
      ]);

      const order = await orders.checkout({
        userId: alice.id,
        shippingAddress: '9 Dock Road',
      });
      const stored = await orders.findOne(order.id);

      const lines = (stored.items ?? [])
        .map((item) => [item.unitPrice, item.quantity, item.totalPrice])
        .sort(([a], [b]) => Number(a) - Number(b));
      expect(lines).toEqual([
        [11, 1, 11],
        [19.99, 2, 39.98],
      ]);
      expect(stored.totalPrice).toBe(50.98);
      expect(stored.shippingAddress).toBe('9 Dock Road');
    });

    it('publishes order_created with the order totals', async () => {
      await fillCart([[plate, 2]]);

      const order = await orders.checkout({ userId: alice.id });

      expect(kafka.patterns()).toEqual(['order_created']);
      expect(kafka.emitted[0].data).toMatchObject({
        orderId: order.id,
        userId: alice.id,
        status: 'pending',
        totalPrice: 22,
      });
    });

    it('rejects an empty cart', async () => {
      await expect(orders.checkout({ userId: alice.id })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });

    it('rolls everything back when a line exceeds the stock', async () => {
      await fillCart([
        [plate, 1],
        [mug, 11],
      ]);

      await expect(orders.checkout({ userId: alice.id })).rejects.toBeInstanceOf(
        BadRequestException,
      );

      expect(await stockOf(mug)).toBe(10);
      expect(await stockOf(plate)).toBe(4);
      expect(await dataSource.getRepository(Order).count()).toBe(0);
      expect(await dataSource.getRepository(CartItem).countBy({ userId: alice.id })).toBe(2);
      expect(kafka.patterns()).toEqual([]);
    });

    it('rejects an unusable coupon without touching stock', async () => {
      await seedCoupon(dataSource, { code: 'PAUSED', isActive: false });
      await fillCart([[mug, 1]]);

      await expect(
        orders.checkout({ userId: alice.id, couponCode: 'PAUSED' }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(await stockOf(mug)).toBe(10);
    });

    it('refuses a cart holding a retired product and names the line', async () => {
      await fillCart([
        [mug, 1],
        [plate, 1],
      ]);
      const retiredLine = await dataSource
        .getRepository(CartItem)
        .findOneByOrFail({ productId: mug.id });
      await dataSource.getRepository(Product).softDelete(mug.id);

      await expect(orders.checkout({ userId: alice.id })).rejects.toThrow(
        `Cart lines ${retiredLine.id} refer to products no longer sold; remove them first`,
      );
      expect(await stockOf(plate)).toBe(4);
      expect(await dataSource.getRepository(Order).count()).toBe(0);
    });

    it('refuses inactive customers', async () => {
      const bob = await seedUser(dataSource, {
        username: 'bob',
        email: 'bob@example.com',
        isActive: false,
      });

      await expect(
        orders.create({ userId: bob.id, items: [{ productId: mug.id, quantity: 1 }] }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('create', () => {
    it('merges repeated products and leaves the cart alone', async () => {
      await fillCart([[plate, 1]]);

      const order = await orders.create(
        {
          userId: alice.id,
          items: [
            { productId: mug.id, quantity: 2 },
            { productId: mug.id, quantity: 1 },
          ],
        },
        'admin-1',
      );

      const stored = await orders.findOne(order.id);
      expect(stored.items?.map((item) => item.quantity)).toEqual([3]);
      expect(stored.totalPrice).toBe(59.97);
      expect(await stockOf(mug)).toBe(7);
      expect(await dataSource.getRepository(CartItem).countBy({ userId: alice.id })).toBe(1);

      const audit = await moduleRef.get(AuditLogService).findAll({ entityId: order.id });
      expect(audit.map((entry) => [entry.action, entry.actorId])).toEqual([
        ['create', 'admin-1'],
      ]);
    });
  });

  describe('lifecycle', () => {
    let order: Order;

    beforeEach(async () => {
      order = await orders.create({
        userId: alice.id,
        items: [{ productId: mug.id, quantity: 4 }],
      });
    });

    it('completes a pending order once', async () => {
      const completed = await orders.complete(order.id);

      expect(completed.status).toBe('completed');
      expect(completed.completedAt).toBeInstanceOf(Date);
      const stored = await orders.findOne(order.id);
      expect(stored.completedAt).toBeInstanceOf(Date);
      expect(stored.cancelledAt).toBeNull();
      expect(kafka.patterns()).toEqual(['order_created', 'order_completed']);
      await expect(orders.cancel(order.id)).rejects.toBeInstanceOf(ConflictException);
      await expect(orders.complete(order.id)).rejects.toBeInstanceOf(ConflictException);
    });

    it('returns the stock when an order is cancelled', async () => {
      expect(await stockOf(mug)).toBe(6);

      const cancelled = await orders.cancel(order.id, 'admin-1');

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.cancelledAt).toBeInstanceOf(Date);
      expect(await stockOf(mug)).toBe(10);
      const reasons = (await inventory.stockHistory(mug.id))
        .map((row) => `${row.reason}:${row.change}`)
        .sort();
      expect(reasons).toEqual(['order:-4', 'order_cancelled:4']);
      expect(kafka.patterns()).toEqual(['order_created', 'order_cancelled']);
      await expect(orders.complete(order.id)).rejects.toBeInstanceOf(ConflictException);
    });

    it('returns stock to a product retired after the order was placed', async () => {
      await dataSource.getRepository(Product).softDelete(mug.id);

      const cancelled = await orders.cancel(order.id);

      expect(cancelled.status).toBe('cancelled');
      const retired = await dataSource
        .getRepository(Product)
        .findOneOrFail({ where: { id: mug.id }, withDeleted: true });
      expect(retired.quantity).toBe(10);
    });

    it('restocks only once when a stale request cancels again', async () => {
      const stale = await orders.findOne(order.id);
      await orders.cancel(order.id);
      jest.spyOn(orders, 'findOne').mockResolvedValueOnce(stale);

      await expect(orders.cancel(order.id)).rejects.toBeInstanceOf(ConflictException);

      expect(await stockOf(mug)).toBe(10);
      expect(kafka.patterns()).toEqual(['order_created', 'order_cancelled']);
    });

    it('does not cancel an order completed by a concurrent request', async () => {
      const stale = await orders.findOne(order.id);
      await orders.complete(order.id);
      jest.spyOn(orders, 'findOne').mockResolvedValueOnce(stale);

      await expect(orders.cancel(order.id)).rejects.toBeInstanceOf(ConflictException);

      expect(await stockOf(mug)).toBe(6);
      expect((await orders.findOne(order.id)).status).toBe('completed');
    });

    it('records status changes in the audit log', async () => {
      await orders.cancel(order.id, 'admin-1');

      const audit = await moduleRef
        .get(AuditLogService)
        .findAll({ entityId: order.id, actorId: 'admin-1' });
      expect(audit.map((entry) => entry.changes)).toEqual([
        { status: { from: 'pending', to: 'cancelled' } },
      ]);
    });

    it('leaves a cancelled order alone when its payment completes', async () => {
      await orders.cancel(order.id);

      const result = await orders.completeForPayment(order.id, 'payment-1');

      expect(result).toBeNull();
      expect((await orders.findOne(order.id)).status).toBe('cancelled');
    });

    it('treats an already completed order as settled', async () => {
      await orders.complete(order.id);

      const result = await orders.completeForPayment(order.id, 'payment-1');

      expect(result?.status).toBe('completed');
      expect(kafka.patterns()).toEqual(['order_created', 'order_completed']);
    });

    it('filters the listing by status', async () => {
      const other = await orders.create({
        userId: alice.id,
        items: [{ productId: plate.id, quantity: 1 }],
      });
      await orders.complete(other.id);

      const pending = await orders.findAll({ status: 'pending' });
      const completed = await orders.findAll({ status: 'completed', userId: alice.id });

      expect(pending.map(({ id }) => id)).toEqual([order.id]);
      expect(completed.map(({ id }) => id)).toEqual([other.id]);
    });
  });

  it('keeps a committed order when the broker is down', async () => {
    jest
      .spyOn(kafka, 'emit')
      .mockReturnValue(throwError(() => new Error('broker down')));
    await fillCart([[plate, 1]]);

    const order = await orders.checkout({ userId: alice.id });

    expect((await orders.findOne(order.id)).status).toBe('pending');
    expect(await stockOf(plate)).toBe(3);
  });
});
