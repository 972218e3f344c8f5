import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import {
  CreateReviewDto,
  DOMAIN_EVENTS,
  ReviewChangedEvent,
  ReviewQueryDto,
  UpdateReviewDto,
  roundMoney,
} from '@app/common';
import { AuditLogService } from '../audit/audit-log.service';
import { Product } from '../catalog/product.entity';
import { User } from '../users/user.entity';
import { Review } from './review.entity';

export interface ProductRating {
  productId: string;
  rating: number;
  reviewCount: number;
}

@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    @InjectRepository(Review)
    private readonly reviewRepository: Repository<Review>,
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly auditLogService: AuditLogService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async create(dto: CreateReviewDto): Promise<Review> {
    const [productExists, userExists] = await Promise.all([
      this.productRepository.exists({ where: { id: dto.productId } }),
      this.userRepository.exists({ where: { id: dto.userId } }),
    ]);
    if (!productExists) {
      throw new NotFoundException(`Product ${dto.productId} not found`);
    }
    if (!userExists) {
      throw new NotFoundException(`User ${dto.userId} not found`);
    }

    const duplicate = await this.reviewRepository.exists({
      where: { productId: dto.productId, userId: dto.userId },
      withDeleted: true,
    });
    if (duplicate) {
      throw new ConflictException(
        `User ${dto.userId} already reviewed product ${dto.productId}`,
      );
    }

    const review = await this.reviewRepository.save(
      this.reviewRepository.create({
        productId: dto.productId,
        userId: dto.userId,
        rating: dto.rating,
        comment: dto.comment ?? '',
        isApproved: false,
      }),
    );
    await this.changed(review);
    return review;
  }

  async findAll(query: ReviewQueryDto = {}): Promise<Review[]> {
    const where: FindOptionsWhere<Review> = {};
    if (query.productId) where.productId = query.productId;
    if (query.isApproved !== undefined) where.isApproved = query.isApproved;
    return this.reviewRepository.find({ where, order: { createdAt: 'DESC' } });
  }

  async findOne(id: string): Promise<Review> {
    const review = await this.reviewRepository.findOneBy({ id });
    if (!review) {
      throw new NotFoundException(`Review ${id} not found`);
    }
    return review;
  }

  async update(id: string, dto: UpdateReviewDto): Promise<Review> {
    const review = await this.findOne(id);
    Object.assign(review, dto);
    const saved = await this.reviewRepository.save(review);
    await this.changed(saved);
    return saved;
  }

  async setApproval(
    id: string,
    isApproved: boolean,
    actorId?: string,
  ): Promise<Review> {
    const review = await this.findOne(id);
    if (review.isApproved === isApproved) {
      return review;
    }

    review.isApproved = isApproved;
    const saved = await this.reviewRepository.save(review);
    await this.auditLogService.record({
      actorId,
      action: 'update',
      entityType: 'review',
      entityId: id,
      changes: { isApproved },
    });
    await this.changed(saved);
    return saved;
  }

  async remove(id: string, actorId?: string): Promise<void> {
    const review = await this.findOne(id);
    await this.reviewRepository.softDelete(id);
    await this.auditLogService.record({
      actorId,
      action: 'delete',
      entityType: 'review',
      entityId: id,
    });
    await this.changed(review);
  }

  /** Mean of approved, non-deleted reviews, to two decimals. */
  async recomputeProductRating(productId: string): Promise<ProductRating> {
    const reviews = await this.reviewRepository.find({
      select: { rating: true },
      where: { productId, isApproved: true },
    });
    const reviewCount = reviews.length;
    const rating =
      reviewCount === 0
        ? 0
        : roundMoney(
            reviews.reduce((sum, review) => sum + review.rating, 0) / reviewCount,
          );

    await this.productRepository.update(
      { id: productId },
      { rating, reviewCount },
    );
    this.logger.log(
      `Product ${productId} rating is now ${rating} over ${reviewCount} reviews`,
    );
    return { productId, rating, reviewCount };
  }

  private async changed(review: Review): Promise<void> {
    const event: ReviewChangedEvent = {
      reviewId: review.id,
      productId: review.productId,
    };
    await this.eventEmitter.emitAsync(DOMAIN_EVENTS.REVIEW_CHANGED, event);
  }
}
