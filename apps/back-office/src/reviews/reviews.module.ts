import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { Product } from '../catalog/product.entity';
import { User } from '../users/user.entity';
import { ProductRatingListener } from './product-rating.listener';
import { Review } from './review.entity';
import { ReviewsController } from './reviews.controller';
import { ReviewsService } from './reviews.service';

@Module({
  imports: [TypeOrmModule.forFeature([Review, Product, User]), AuditModule],
  controllers: [ReviewsController],
  providers: [ReviewsService, ProductRatingListener],
})
export class ReviewsModule {}
