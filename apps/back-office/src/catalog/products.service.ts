import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import {
  AddProductImageDto,
  AddProductVideoDto,
  CreateProductDto,
  ProductQueryDto,
  StockStatus,
  UpdateProductDto,
  localize,
  stockStatus,
} from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { Category } from './category.entity';
import { InventoryService } from './inventory.service';
import { ProductImage } from './product-image.entity';
import { ProductVideo } from './product-video.entity';
import { Product } from './product.entity';

export type ProductView = Product & {
  displayName: string;
  stockStatus: StockStatus;
};

const normalizeTags = (tags: string[] = []): string[] => {
  const cleaned = tags.map((tag) => tag.trim().toLowerCase()).filter(Boolean);
  if (cleaned.some((tag) => tag.includes(','))) {
    throw new BadRequestException('Tags cannot contain commas');
  }
  return [...new Set(cleaned)];
};

@Injectable()
export class ProductsService {
  private readonly logger = new Logger(ProductsService.name);

  constructor(
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    @InjectRepository(ProductImage)
    private readonly imageRepository: Repository<ProductImage>,
    @InjectRepository(ProductVideo)
    private readonly videoRepository: Repository<ProductVideo>,
    private readonly inventoryService: InventoryService,
    private readonly auditLogService: AuditLogService,
    private readonly configService: ConfigService,
  ) {}

  async create(dto: CreateProductDto, actorId?: string): Promise<Product> {
    const skuTaken = await this.productRepository.exists({
      where: { sku: dto.sku },
      withDeleted: true,
    });
    if (skuTaken) {
      throw new ConflictException(`SKU ${dto.sku} is already in use`);
    }

    const product = await this.productRepository.manager.transaction(
      async (manager) => {
        const category = await manager.findOneBy(Category, {
          id: dto.categoryId,
        });
        if (!category) {
          throw new NotFoundException(`Category ${dto.categoryId} not found`);
        }

        const created = await manager.save(
          manager.create(Product, {
            name: dto.name,
            description: dto.description ?? null,
            sku: dto.sku,
            price: dto.price,
            quantity: 0,
            tags: normalizeTags(dto.tags),
            categoryId: category.id,
            isActive: dto.isActive ?? true,
          }),
        );

        // opening stock goes through the ledger like every other movement
        if (dto.quantity) {
          await this.inventoryService.applyStockChange(
            manager,
            created.id,
            dto.quantity,
            'restock',
            'initial stock',
          );
          created.quantity = dto.quantity;
        }

        await this.auditLogService.record(
          {
            actorId,
            action: 'create',
            entityType: 'product',
            entityId: created.id,
            changes: { sku: created.sku, price: created.price },
          },
          manager,
        );
        return created;
      },
    );

    this.logger.log(`Created product ${product.sku}`);
    return product;
  }

  async findAll(query: ProductQueryDto = {}): Promise<ProductView[]> {
    const where: FindOptionsWhere<Product> = {};
    if (query.categoryId) where.categoryId = query.categoryId;
    if (query.isActive !== undefined) where.isActive = query.isActive;

    const products = await this.productRepository.find({
      where,
      order: { sku: 'ASC' },
    });
    const tag = query.tag?.trim().toLowerCase();

    return products
      .filter((product) => !tag || product.tags.includes(tag))
      .map((product) => this.toView(product, query.lang))
      .filter(
        (view) => !query.stockStatus || view.stockStatus === query.stockStatus,
      );
  }

  async findOne(id: string, lang?: string): Promise<ProductView> {
    const product = await this.productRepository.findOne({
      where: { id },
      relations: { images: true, videos: true, category: true },
      order: { images: { position: 'ASC' } },
    });
    if (!product) {
      throw new NotFoundException(`Product ${id} not found`);
    }
    return this.toView(product, lang);
  }

  async update(
    id: string,
    dto: UpdateProductDto,
    actorId?: string,
  ): Promise<Product> {
    const product = await this.getProduct(id);
    if (dto.categoryId && dto.categoryId !== product.categoryId) {
      const categoryExists = await this.productRepository.manager.exists(
        Category,
        { where: { id: dto.categoryId } },
      );
      if (!categoryExists) {
        throw new NotFoundException(`Category ${dto.categoryId} not found`);
      }
    }

    const { tags, ...rest } = dto;
    Object.assign(product, rest);
    if (tags) {
      product.tags = normalizeTags(tags);
    }
    const saved = await this.productRepository.save(product);

    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'product',
      entityId: id,
      changes: { ...dto },
    });
    return saved;
  }

  async remove(id: string, actorId?: string): Promise<void> {
    await this.getProduct(id);
    await this.productRepository.softDelete(id);
    await this.auditLogService.record({
      actorId,
      action: 'delete',
      entityType: 'product',
      entityId: id,
    });
  }

  async addImage(
    productId: string,
    dto: AddProductImageDto,
    actorId?: string,
  ): Promise<ProductImage> {
    await this.getProduct(productId);
    const count = await this.imageRepository.countBy({ productId });

    const image = await this.imageRepository.save(
      this.imageRepository.create({
        productId,
        url: dto.url,
        altText: dto.altText ?? '',
        position: dto.position ?? count,
        isPrimary: count === 0,
      }),
    );

    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'product',
      entityId: productId,
      changes: { imageAdded: image.id },
    });
    return image;
  }

  async setPrimaryImage(
    productId: string,
    imageId: string,
    actorId?: string,
  ): Promise<ProductImage> {
    const image = await this.getImage(productId, imageId);

    await this.imageRepository.manager.transaction(async (manager) => {
      await manager.update(ProductImage, { productId }, { isPrimary: false });
      await manager.update(ProductImage, { id: imageId }, { isPrimary: true });
      await this.auditLogService.record(
        {
          actorId,
          action: 'update',
          entityType: 'product',
          entityId: productId,
          changes: { primaryImage: imageId },
        },
        manager,
      );
    });

    image.isPrimary = true;
    return image;
  }

  async removeImage(
    productId: string,
    imageId: string,
    actorId?: string,
  ): Promise<void> {
    const image = await this.getImage(productId, imageId);

    await this.imageRepository.manager.transaction(async (manager) => {
      await manager.delete(ProductImage, { id: imageId });
      if (image.isPrimary) {
        const next = await manager.findOne(ProductImage, {
          where: { productId },
          order: { position: 'ASC', createdAt: 'ASC' },
        });
        if (next) {
          await manager.update(ProductImage, { id: next.id }, { isPrimary: true });
        }
      }
      await this.auditLogService.record(
        {
          actorId,
          action: 'update',
          entityType: 'product',
          entityId: productId,
          changes: { imageRemoved: imageId },
        },
        manager,
      );
    });
  }

  async addVideo(
    productId: string,
    dto: AddProductVideoDto,
    actorId?: string,
  ): Promise<ProductVideo> {
    await this.getProduct(productId);
    const video = await this.videoRepository.save(
      this.videoRepository.create({
        productId,
        url: dto.url,
        title: dto.title ?? '',
      }),
    );
    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'product',
      entityId: productId,
      changes: { videoAdded: video.id },
    });
    return video;
  }

  async removeVideo(
    productId: string,
    videoId: string,
    actorId?: string,
  ): Promise<void> {
    const result = await this.videoRepository.delete({ id: videoId, productId });
    if (!result.affected) {
      throw new NotFoundException(
        `Video ${videoId} not found on product ${productId}`,
      );
    }
    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'product',
      entityId: productId,
      changes: { videoRemoved: videoId },
    });
  }

  toView(product: Product, lang?: string): ProductView {
    const defaultLanguage = this.configService.get<string>(
      'catalog.defaultLanguage',
      'en',
    );
    const threshold = this.configService.get<number>(
      'catalog.lowStockThreshold',
      5,
    );
    return Object.assign(product, {
      displayName: localize(
        product.name,
        lang ?? defaultLanguage,
        defaultLanguage,
      ),
      stockStatus: stockStatus(product.quantity, threshold),
    });
  }

  private async getProduct(id: string): Promise<Product> {
    const product = await this.productRepository.findOneBy({ id });
    if (!product) {
      throw new NotFoundException(`Product ${id} not found`);
    }
    return product;
  }

  private async getImage(productId: string, imageId: string): Promise<ProductImage> {
    const image = await this.imageRepository.findOneBy({ id: imageId, productId });
    if (!image) {
      throw new NotFoundException(
        `Image ${imageId} not found on product ${productId}`,
      );
    }
    return image;
  }
}
