import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { CategoriesController, ProductsController } from './catalog.controller';
import { CategoriesService } from './categories.service';
import { Category } from './category.entity';
import { InventoryService } from './inventory.service';
import { ProductImage } from './product-image.entity';
import { ProductVideo } from './product-video.entity';
import { Product } from './product.entity';
import { ProductsService } from './products.service';
import { StockHistory } from './stock-history.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Category,
      Product,
      ProductImage,
      ProductVideo,
      StockHistory,
    ]),
    AuditModule,
  ],
  controllers: [CategoriesController, ProductsController],
  providers: [CategoriesService, ProductsService, InventoryService],
  exports: [ProductsService, InventoryService],
})
export class CatalogModule {}
