import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import {
  CheckoutDto,
  CreateOrderDto,
  ORDER_PATTERNS,
  ORDER_TRANSITIONS,
  OrderItemInputDto,
  OrderQueryDto,
  OrderStatus,
  canTransition,
  discountAmount,
  roundMoney,
  subtotal,
} from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { CartItem } from '../cart/cart-item.entity';
import { InventoryService } from '../catalog/inventory.service';
import { Product } from '../catalog/product.entity';
import { Coupon } from '../coupons/coupon.entity';
import { CouponsService } from '../coupons/coupons.service';
import { User } from '../users/user.entity';
import { OrderEventsPublisher } from './order-events.publisher';
import { OrderItem } from './order-item.entity';
import { Order } from './order.entity';

interface OrderDraft {
  userId: string;
  lines: OrderItemInputDto[];
  couponCode?: string;
  shippingAddress?: string;
  fromCart: boolean;
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Order)
    private readonly orderRepository: Repository<Order>,
    private readonly inventoryService: InventoryService,
    private readonly couponsService: CouponsService,
    private readonly auditLogService: AuditLogService,
    private readonly orderEvents: OrderEventsPublisher,
  ) {}

  /** Turns the user's cart into a pending order and empties the cart. */
  async checkout(dto: CheckoutDto, actorId?: string): Promise<Order> {
    const cartItems = await this.orderRepository.manager.find(CartItem, {
      where: { userId: dto.userId },
      relations: { product: true },
      order: { addedAt: 'ASC' },
    });
    // the join drops soft-deleted products
    const unavailable = cartItems.filter((item) => !item.product);
    if (unavailable.length > 0) {
      throw new BadRequestException(
        `Cart lines ${unavailable.map((item) => item.id).join(', ')} refer to products no longer sold; remove them first`,
      );
    }
    return this.placeOrder(
      {
        userId: dto.userId,
        lines: cartItems.map(({ productId, quantity }) => ({ productId, quantity })),
        couponCode: dto.couponCode,
        shippingAddress: dto.shippingAddress,
        fromCart: true,
      },
      actorId,
    );
  }

  async create(dto: CreateOrderDto, actorId?: string): Promise<Order> {
    return this.placeOrder(
      {
        userId: dto.userId,
        lines: dto.items,
        couponCode: dto.couponCode,
        shippingAddress: dto.shippingAddress,
        fromCart: false,
      },
      actorId,
    );
  }

  async findAll(query: OrderQueryDto = {}): Promise<Order[]> {
    const where: FindOptionsWhere<Order> = {};
    if (query.status) where.status = query.status;
    if (query.userId) where.userId = query.userId;
    return this.orderRepository.find({
      where,
      relations: { items: true },
      order: { createdAt: 'DESC' },
    });
  }

  async findOne(id: string): Promise<Order> {
    const order = await this.orderRepository.findOne({
      where: { id },
      relations: { items: true },
    });
    if (!order) {
      throw new NotFoundException(`Order ${id} not found`);
    }
    return order;
  }

  async complete(id: string, actorId?: string): Promise<Order> {
    const order = await this.findOne(id);
    this.assertTransition(order, 'completed');

    await this.orderRepository.manager.transaction(async (manager) => {
      await this.claimTransition(manager, order, 'completed', {
        completedAt: new Date(),
      });
      await this.recordStatusChange(order, 'pending', actorId, manager);
    });

    this.logger.log(`Order ${order.id} completed`);
    await this.orderEvents.publish(ORDER_PATTERNS.ORDER_COMPLETED, order);
    return order;
  }

  async cancel(id: string, actorId?: string): Promise<Order> {
    const order = await this.findOne(id);
    this.assertTransition(order, 'cancelled');

    await this.orderRepository.manager.transaction(async (manager) => {
      await this.claimTransition(manager, order, 'cancelled', {
        cancelledAt: new Date(),
      });
      for (const item of order.items ?? []) {
        await this.inventoryService.applyStockChange(
          manager,
          item.productId,
          item.quantity,
          'order_cancelled',
          order.id,
          true,
        );
      }
      await this.recordStatusChange(order, 'pending', actorId, manager);
    });

    this.logger.log(`Order ${order.id} cancelled, stock returned`);
    await this.orderEvents.publish(ORDER_PATTERNS.ORDER_CANCELLED, order);
    return order;
  }

  /**
   * Completes the order behind a finished payment. Orders that already
   * left pending are reported and left as they are.
   */
  async completeForPayment(orderId: string, paymentId: string): Promise<Order | null> {
    const order = await this.findOne(orderId);
    if (order.status === 'completed') {
      return order;
    }
    if (!canTransition(ORDER_TRANSITIONS, order.status, 'completed')) {
      this.logger.warn(
        `Payment ${paymentId} completed for ${order.status} order ${orderId}; order left unchanged`,
      );
      return null;
    }
    return this.complete(orderId);
  }

  private async placeOrder(draft: OrderDraft, actorId?: string): Promise<Order> {
    const lines = this.mergeLines(draft.lines);
    if (lines.length === 0) {
      throw new BadRequestException(
        draft.fromCart ? 'Cart is empty' : 'An order needs at least one item',
      );
    }

    const order = await this.orderRepository.manager.transaction(async (manager) => {
      const user = await manager.findOneBy(User, { id: draft.userId });
      if (!user) {
        throw new NotFoundException(`User ${draft.userId} not found`);
      }
      if (!user.isActive) {
        throw new BadRequestException(`User ${user.username} is inactive`);
      }

      const items: OrderItem[] = [];
      for (const line of lines) {
        const product = await manager.findOneBy(Product, { id: line.productId });
        if (!product) {
          throw new NotFoundException(`Product ${line.productId} not found`);
        }
        if (!product.isActive) {
          throw new BadRequestException(`Product ${product.sku} is not for sale`);
        }
        items.push(
          manager.create(OrderItem, {
            productId: product.id,
            quantity: line.quantity,
            unitPrice: product.price,
          }),
        );
      }

      const coupon: Coupon | null = draft.couponCode
        ? await this.couponsService.findValidByCode(draft.couponCode, new Date(), manager)
        : null;
      const totals = this.priceOrder(items, coupon?.discountPercent ?? 0);

      const saved = await manager.save(
        manager.create(Order, {
          userId: user.id,
          status: 'pending',
          couponId: coupon?.id ?? null,
          discountPercent: coupon?.discountPercent ?? 0,
          shippingAddress: draft.shippingAddress ?? user.address,
          ...totals,
          items,
        }),
      );

      for (const item of items) {
        await this.inventoryService.applyStockChange(
          manager,
          item.productId,
          -item.quantity,
          'order',
          saved.id,
        );
      }
      if (draft.fromCart) {
        await manager.delete(CartItem, { userId: user.id });
      }

      await this.auditLogService.record(
        {
          actorId,
          action: 'create',
          entityType: 'order',
          entityId: saved.id,
          changes: { totalPrice: saved.totalPrice, coupon: coupon?.code ?? null },
        },
        manager,
      );
      return saved;
    });

    this.logger.log(
      `Order ${order.id} placed for user ${order.userId}: ${order.totalPrice}`,
    );
    await this.orderEvents.publish(ORDER_PATTERNS.ORDER_CREATED, order);
    return order;
  }

  priceOrder(
    items: readonly Pick<OrderItem, 'unitPrice' | 'quantity'>[],
    discountPercent: number,
  ): Pick<Order, 'subtotal' | 'discount' | 'totalPrice'> {
    const amount = subtotal(items);
    const discount = discountAmount(amount, discountPercent);
    return {
      subtotal: amount,
      discount,
      totalPrice: roundMoney(amount - discount),
    };
  }

  private mergeLines(lines: readonly OrderItemInputDto[]): OrderItemInputDto[] {
    const merged = new Map<string, number>();
    for (const { productId, quantity } of lines) {
      merged.set(productId, (merged.get(productId) ?? 0) + quantity);
    }
    return [...merged].map(([productId, quantity]) => ({ productId, quantity }));
  }

  private assertTransition(order: Order, to: OrderStatus): void {
    if (!canTransition(ORDER_TRANSITIONS, order.status, to)) {
      throw new ConflictException(
        `Order ${order.id} is ${order.status} and cannot become ${to}`,
      );
    }
  }

  /**
   * Moves the order out of its current status with a guarded UPDATE, so of
   * two concurrent requests only the first one proceeds.
   */
  private async claimTransition(
    manager: EntityManager,
    order: Order,
    to: OrderStatus,
    stamps: Pick<Partial<Order>, 'completedAt' | 'cancelledAt'>,
  ): Promise<void> {
    const result = await manager
      .createQueryBuilder()
      .update(Order)
      .set({ status: to, ...stamps })
      .where('id = :id', { id: order.id })
      .andWhere('status = :from', { from: order.status })
      .execute();
    if (!result.affected) {
      throw new ConflictException(
        `Order ${order.id} changed status concurrently and cannot become ${to}`,
      );
    }
    Object.assign(order, { status: to, ...stamps });
  }

  private async recordStatusChange(
    order: Order,
    from: OrderStatus,
    actorId: string | undefined,
    manager: EntityManager,
  ): Promise<void> {
    await this.auditLogService.record(
      {
        actorId,
        action: 'status_change',
        entityType: 'order',
        entityId: order.id,
        changes: { status: { from, to: order.status } },
      },
      manager,
    );
  }
}
