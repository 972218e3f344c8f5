import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import {
  Actor,
  AddProductImageDto,
  AddProductVideoDto,
  AdjustStockDto,
  CreateCategoryDto,
  CreateProductDto,
  ProductQueryDto,
  UpdateCategoryDto,
  UpdateProductDto,
} from '@app/common';
import { CategoriesService } from './categories.service';
import { InventoryService } from './inventory.service';
import { ProductsService } from './products.service';

@Controller('categories')
export class CategoriesController {
  constructor(private readonly categoriesService: CategoriesService) {}

  @Post()
  async create(@Body() dto: CreateCategoryDto, @Actor() actorId?: string) {
    return this.categoriesService.create(dto, actorId);
  }

  @Get()
  async findAll() {
    return this.categoriesService.findAll();
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.categoriesService.findOne(id);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateCategoryDto,
    @Actor() actorId?: string,
  ) {
    return this.categoriesService.update(id, dto, actorId);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    await this.categoriesService.remove(id, actorId);
  }
}

@Controller('products')
export class ProductsController {
  constructor(
    private readonly productsService: ProductsService,
    private readonly inventoryService: InventoryService,
  ) {}

  @Post()
  async create(@Body() dto: CreateProductDto, @Actor() actorId?: string) {
    return this.productsService.create(dto, actorId);
  }

  @Get()
  async findAll(@Query() query: ProductQueryDto) {
    return this.productsService.findAll(query);
  }

  @Get(':id')
  async findOne(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('lang') lang?: string,
  ) {
    return this.productsService.findOne(id, lang);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateProductDto,
    @Actor() actorId?: string,
  ) {
    return this.productsService.update(id, dto, actorId);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @Actor() actorId?: string,
  ) {
    await this.productsService.remove(id, actorId);
  }

  @Post(':id/stock')
  async adjustStock(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AdjustStockDto,
    @Actor() actorId?: string,
  ) {
    return this.inventoryService.adjustStock(id, dto, actorId);
  }

  @Get(':id/stock-history')
  async stockHistory(@Param('id', ParseUUIDPipe) id: string) {
    return this.inventoryService.stockHistory(id);
  }

  @Post(':id/images')
  async addImage(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AddProductImageDto,
    @Actor() actorId?: string,
  ) {
    return this.productsService.addImage(id, dto, actorId);
  }

  @Post(':id/images/:imageId/primary')
  async setPrimaryImage(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('imageId', ParseUUIDPipe) imageId: string,
    @Actor() actorId?: string,
  ) {
    return this.productsService.setPrimaryImage(id, imageId, actorId);
  }

  @Delete(':id/images/:imageId')
  @HttpCode(204)
  async removeImage(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('imageId', ParseUUIDPipe) imageId: string,
    @Actor() actorId?: string,
  ) {
    await this.productsService.removeImage(id, imageId, actorId);
  }

  @Post(':id/videos')
  async addVideo(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AddProductVideoDto,
    @Actor() actorId?: string,
  ) {
    return this.productsService.addVideo(id, dto, actorId);
  }

  @Delete(':id/videos/:videoId')
  @HttpCode(204)
  async removeVideo(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('videoId', ParseUUIDPipe) videoId: string,
    @Actor() actorId?: string,
  ) {
    await this.productsService.removeVideo(id, videoId, actorId);
  }
}
