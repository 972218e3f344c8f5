import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AdjustStockDto, StockReason } from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { Product } from './product.entity';
import { StockHistory } from './stock-history.entity';

@Injectable()
export class InventoryService {
  private readonly logger = new Logger(InventoryService.name);

  constructor(
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    @InjectRepository(StockHistory)
    private readonly historyRepository: Repository<StockHistory>,
    private readonly auditLogService: AuditLogService,
  ) {}

  async adjustStock(
    productId: string,
    dto: AdjustStockDto,
    actorId?: string,
  ): Promise<StockHistory> {
    return this.productRepository.manager.transaction(async (manager) => {
      const entry = await this.applyStockChange(
        manager,
        productId,
        dto.change,
        dto.reason,
        dto.reference,
      );
      await this.auditLogService.record(
        {
          actorId,
          action: 'update',
          entityType: 'product',
          entityId: productId,
          changes: {
            quantity: { change: dto.change, after: entry.quantityAfter },
            reason: dto.reason,
          },
        },
        manager,
      );
      return entry;
    });
  }

  /**
   * Moves stock by `change` and appends the history row, inside the caller's
   * transaction. The guard lives in the UPDATE so two concurrent orders
   * cannot both take the last unit.
   *
   * Soft-deleted products are skipped unless `withDeleted` is set; cancelled
   * orders still return their units to a retired product.
   */
  async applyStockChange(
    manager: EntityManager,
    productId: string,
    change: number,
    reason: StockReason,
    reference?: string,
    withDeleted = false,
  ): Promise<StockHistory> {
    if (!Number.isInteger(change) || change === 0) {
      throw new BadRequestException('Stock change must be a non-zero integer');
    }

    const update = manager
      .createQueryBuilder()
      .update(Product)
      .set({ quantity: () => 'quantity + :change' })
      .where('id = :productId', { productId })
      .andWhere('quantity + :change >= 0')
      .setParameter('change', change);
    if (!withDeleted) {
      update.andWhere('"deletedAt" IS NULL');
    }
    const result = await update.execute();

    if (!result.affected) {
      const product = await manager.findOne(Product, {
        where: { id: productId },
        withDeleted,
      });
      if (!product) {
        throw new NotFoundException(`Product ${productId} not found`);
      }
      this.logger.warn(
        `Rejected stock change ${change} for ${product.sku}: only ${product.quantity} left`,
      );
      throw new BadRequestException(
        `Insufficient stock for ${product.sku}: ${product.quantity} available`,
      );
    }

    const { quantity } = await manager.findOneOrFail(Product, {
      where: { id: productId },
      withDeleted,
    });
    const entry = await manager.save(
      manager.create(StockHistory, {
        productId,
        change,
        quantityAfter: quantity,
        reason,
        reference: reference ?? null,
      }),
    );

    this.logger.log(
      `Stock ${change > 0 ? '+' : ''}${change} (${reason}) for product ${productId}, now ${quantity}`,
    );
    return entry;
  }

  async stockHistory(productId: string): Promise<StockHistory[]> {
    const exists = await this.productRepository.exists({
      where: { id: productId },
      withDeleted: true,
    });
    if (!exists) {
      throw new NotFoundException(`Product ${productId} not found`);
    }
    return this.historyRepository.find({
      where: { productId },
      order: { createdAt: 'ASC' },
    });
  }
}
