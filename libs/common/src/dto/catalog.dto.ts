import { Transform, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  IsUrl,
  Length,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';
import { STOCK_REASONS, StockReason } from '../constants/choices';
import { IsLocalizedText } from '../localization/is-localized-text.decorator';
import { LocalizedText } from '../localization/localized-text';
import { StockStatus } from '../pricing/pricing';
import { toBoolean } from './query-transforms';

const SLUG = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export class CreateCategoryDto {
  @IsLocalizedText()
  name!: LocalizedText;

  @IsOptional()
  @IsLocalizedText()
  description?: LocalizedText;

  @IsString()
  @Matches(SLUG, { message: 'slug must be lowercase words joined by hyphens' })
  slug!: string;

  @IsOptional()
  @IsUUID()
  parentId?: string;
}

export class UpdateCategoryDto {
  @IsOptional()
  @IsLocalizedText()
  name?: LocalizedText;

  @IsOptional()
  @IsLocalizedText()
  description?: LocalizedText;

  @IsOptional()
  @IsString()
  @Matches(SLUG, { message: 'slug must be lowercase words joined by hyphens' })
  slug?: string;

  // null moves the category back to the top level
  @IsOptional()
  @IsUUID()
  parentId?: string | null;
}

export class CreateProductDto {
  @IsLocalizedText()
  name!: LocalizedText;

  @IsOptional()
  @IsLocalizedText()
  description?: LocalizedText;

  @IsString()
  @IsNotEmpty()
  @Length(1, 64)
  sku!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  quantity?: number;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(50, { each: true })
  tags?: string[];

  @IsUUID()
  categoryId!: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateProductDto {
  @IsOptional()
  @IsLocalizedText()
  name?: LocalizedText;

  @IsOptional()
  @IsLocalizedText()
  description?: LocalizedText;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price?: number;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(50, { each: true })
  tags?: string[];

  @IsOptional()
  @IsUUID()
  categoryId?: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class ProductQueryDto {
  @IsOptional()
  @IsUUID()
  categoryId?: string;

  @IsOptional()
  @IsString()
  tag?: string;

  @IsOptional()
  @IsIn(['in_stock', 'low_stock', 'out_of_stock'])
  stockStatus?: StockStatus;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  isActive?: boolean;

  @IsOptional()
  @IsString()
  @Matches(/^[a-z]{2}(-[A-Z]{2})?$/)
  lang?: string;
}

export class AdjustStockDto {
  @IsInt()
  change!: number;

  @IsIn(STOCK_REASONS)
  reason!: StockReason;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  reference?: string;
}

export class AddProductImageDto {
  @IsUrl()
  url!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  altText?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  position?: number;
}

export class AddProductVideoDto {
  @IsUrl()
  url!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string;
}
