import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CreateCategoryDto, UpdateCategoryDto } from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { Category } from './category.entity';
import { Product } from './product.entity';

@Injectable()
export class CategoriesService {
  constructor(
    @InjectRepository(Category)
    private readonly categoryRepository: Repository<Category>,
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    private readonly auditLogService: AuditLogService,
  ) {}

  async create(dto: CreateCategoryDto, actorId?: string): Promise<Category> {
    await this.assertSlugFree(dto.slug);
    if (dto.parentId) {
      await this.findOne(dto.parentId);
    }

    const category = await this.categoryRepository.save(
      this.categoryRepository.create({
        name: dto.name,
        description: dto.description ?? null,
        slug: dto.slug,
        parentId: dto.parentId ?? null,
      }),
    );

    await this.auditLogService.record({
      actorId,
      action: 'create',
      entityType: 'category',
      entityId: category.id,
      changes: { slug: category.slug },
    });
    return category;
  }

  async findAll(): Promise<Category[]> {
    return this.categoryRepository.find({ order: { slug: 'ASC' } });
  }

  async findOne(id: string): Promise<Category> {
    const category = await this.categoryRepository.findOneBy({ id });
    if (!category) {
      throw new NotFoundException(`Category ${id} not found`);
    }
    return category;
  }

  async update(
    id: string,
    dto: UpdateCategoryDto,
    actorId?: string,
  ): Promise<Category> {
    const category = await this.findOne(id);
    if (dto.slug && dto.slug !== category.slug) {
      await this.assertSlugFree(dto.slug);
    }
    if (dto.parentId) {
      await this.assertNotOwnAncestor(id, dto.parentId);
    }

    Object.assign(category, dto);
    const saved = await this.categoryRepository.save(category);

    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'category',
      entityId: id,
      changes: { ...dto },
    });
    return saved;
  }

  async remove(id: string, actorId?: string): Promise<void> {
    await this.findOne(id);
    const inUse = await this.productRepository.exists({
      where: { categoryId: id },
    });
    if (inUse) {
      throw new ConflictException(
        `Category ${id} still has products; move them first`,
      );
    }

    await this.categoryRepository.softDelete(id);
    await this.auditLogService.record({
      actorId,
      action: 'delete',
      entityType: 'category',
      entityId: id,
    });
  }

  private async assertSlugFree(slug: string): Promise<void> {
    const taken = await this.categoryRepository.exists({
      where: { slug },
      withDeleted: true,
    });
    if (taken) {
      throw new ConflictException(`Category slug ${slug} is already in use`);
    }
  }

  private async assertNotOwnAncestor(id: string, parentId: string): Promise<void> {
    let cursor: string | null = parentId;
    while (cursor) {
      if (cursor === id) {
        throw new BadRequestException('A category cannot be its own ancestor');
      }
      const parent: Category = await this.findOne(cursor);
      cursor = parent.parentId;
    }
  }
}
