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
} from '@nestjs/common';
import {
  AddCartItemDto,
  AddWishlistItemDto,
  UpdateCartItemDto,
} from '@app/common';
import { CartService } from './cart.service';

@Controller('users/:userId')
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get('cart')
  async getCart(@Param('userId', ParseUUIDPipe) userId: string) {
    return this.cartService.getCart(userId);
  }

  @Post('cart/items')
  async addItem(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Body() dto: AddCartItemDto,
  ) {
    return this.cartService.addItem(userId, dto);
  }

  @Patch('cart/items/:itemId')
  async updateItem(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Param('itemId', ParseUUIDPipe) itemId: string,
    @Body() dto: UpdateCartItemDto,
  ) {
    return this.cartService.updateItem(userId, itemId, dto);
  }

  @Delete('cart/items/:itemId')
  async removeItem(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Param('itemId', ParseUUIDPipe) itemId: string,
  ) {
    return this.cartService.removeItem(userId, itemId);
  }

  @Delete('cart')
  @HttpCode(204)
  async clear(@Param('userId', ParseUUIDPipe) userId: string) {
    await this.cartService.clear(userId);
  }

  @Get('wishlist')
  async getWishlist(@Param('userId', ParseUUIDPipe) userId: string) {
    return this.cartService.getWishlist(userId);
  }

  @Post('wishlist')
  async addToWishlist(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Body() dto: AddWishlistItemDto,
  ) {
    return this.cartService.addToWishlist(userId, dto);
  }

  @Delete('wishlist/:productId')
  @HttpCode(204)
  async removeFromWishlist(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Param('productId', ParseUUIDPipe) productId: string,
  ) {
    await this.cartService.removeFromWishlist(userId, productId);
  }

  @Post('wishlist/:productId/move-to-cart')
  async moveToCart(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Param('productId', ParseUUIDPipe) productId: string,
  ) {
    return this.cartService.moveWishlistItemToCart(userId, productId);
  }
}
