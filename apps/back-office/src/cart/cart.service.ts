import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  AddCartItemDto,
  AddWishlistItemDto,
  UpdateCartItemDto,
  lineTotal,
  subtotal,
} from '@app/common';
import { Product } from '../catalog/product.entity';
import { User } from '../users/user.entity';
import { CartItem } from './cart-item.entity';
import { WishlistItem } from './wishlist-item.entity';

export interface CartLine {
  id: string;
  productId: string;
  sku: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
}

export interface CartView {
  userId: string;
  items: CartLine[];
  // lines whose product was retired; checkout refuses until they are removed
  unavailable: Pick<CartLine, 'id' | 'productId' | 'quantity'>[];
  itemCount: number;
  subtotal: number;
}

@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    @InjectRepository(CartItem)
    private readonly cartRepository: Repository<CartItem>,
    @InjectRepository(WishlistItem)
    private readonly wishlistRepository: Repository<WishlistItem>,
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async getCart(userId: string): Promise<CartView> {
    await this.getUser(userId);
    const items = await this.cartRepository.find({
      where: { userId },
      relations: { product: true },
      order: { addedAt: 'ASC' },
    });

    // the join leaves out soft-deleted products
    const lines: CartLine[] = items.flatMap((item) =>
      item.product
        ? [
            {
              id: item.id,
              productId: item.productId,
              sku: item.product.sku,
              quantity: item.quantity,
              unitPrice: item.product.price,
              totalPrice: lineTotal(item.product.price, item.quantity),
            },
          ]
        : [],
    );

    return {
      userId,
      items: lines,
      unavailable: items
        .filter((item) => !item.product)
        .map(({ id, productId, quantity }) => ({ id, productId, quantity })),
      itemCount: lines.reduce((sum, line) => sum + line.quantity, 0),
      subtotal: subtotal(lines),
    };
  }

  async addItem(userId: string, dto: AddCartItemDto): Promise<CartView> {
    await this.getUser(userId);
    const product = await this.getPurchasableProduct(dto.productId);
    const existing = await this.cartRepository.findOneBy({
      userId,
      productId: dto.productId,
    });

    const quantity = (existing?.quantity ?? 0) + dto.quantity;
    this.assertInStock(product, quantity);

    if (existing) {
      existing.quantity = quantity;
      await this.cartRepository.save(existing);
    } else {
      await this.cartRepository.save(
        this.cartRepository.create({ userId, productId: dto.productId, quantity }),
      );
    }
    this.logger.log(`Cart of ${userId}: ${product.sku} x${quantity}`);
    return this.getCart(userId);
  }

  async updateItem(
    userId: string,
    itemId: string,
    dto: UpdateCartItemDto,
  ): Promise<CartView> {
    const item = await this.cartRepository.findOneBy({ id: itemId, userId });
    if (!item) {
      throw new NotFoundException(`Cart item ${itemId} not found`);
    }

    if (dto.quantity === 0) {
      await this.cartRepository.delete(item.id);
    } else {
      const product = await this.getPurchasableProduct(item.productId);
      this.assertInStock(product, dto.quantity);
      item.quantity = dto.quantity;
      await this.cartRepository.save(item);
    }
    return this.getCart(userId);
  }

  async removeItem(userId: string, itemId: string): Promise<CartView> {
    const result = await this.cartRepository.delete({ id: itemId, userId });
    if (!result.affected) {
      throw new NotFoundException(`Cart item ${itemId} not found`);
    }
    return this.getCart(userId);
  }

  async clear(userId: string): Promise<void> {
    await this.cartRepository.delete({ userId });
  }

  async getWishlist(userId: string): Promise<WishlistItem[]> {
    await this.getUser(userId);
    return this.wishlistRepository.find({
      where: { userId },
      relations: { product: true },
      order: { addedAt: 'ASC' },
    });
  }

  async addToWishlist(
    userId: string,
    dto: AddWishlistItemDto,
  ): Promise<WishlistItem> {
    await this.getUser(userId);
    await this.getPurchasableProduct(dto.productId);

    const existing = await this.wishlistRepository.findOneBy({
      userId,
      productId: dto.productId,
    });
    if (existing) {
      return existing;
    }
    return this.wishlistRepository.save(
      this.wishlistRepository.create({ userId, productId: dto.productId }),
    );
  }

  async removeFromWishlist(userId: string, productId: string): Promise<void> {
    const result = await this.wishlistRepository.delete({ userId, productId });
    if (!result.affected) {
      throw new NotFoundException(`Product ${productId} is not on the wishlist`);
    }
  }

  async moveWishlistItemToCart(
    userId: string,
    productId: string,
  ): Promise<CartView> {
    const entry = await this.wishlistRepository.findOneBy({ userId, productId });
    if (!entry) {
      throw new NotFoundException(`Product ${productId} is not on the wishlist`);
    }
    const cart = await this.addItem(userId, { productId, quantity: 1 });
    await this.wishlistRepository.delete(entry.id);
    return cart;
  }

  private async getUser(userId: string): Promise<User> {
    const user = await this.userRepository.findOneBy({ id: userId });
    if (!user) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    return user;
  }

  private async getPurchasableProduct(productId: string): Promise<Product> {
    const product = await this.productRepository.findOneBy({ id: productId });
    if (!product) {
      throw new NotFoundException(`Product ${productId} not found`);
    }
    if (!product.isActive) {
      throw new BadRequestException(`Product ${product.sku} is not for sale`);
    }
    return product;
  }

  private assertInStock(product: Product, quantity: number): void {
    if (product.quantity < quantity) {
      throw new BadRequestException(
        `Insufficient stock for ${product.sku}: ${product.quantity} available`,
      );
    }
  }
}
