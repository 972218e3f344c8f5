import {
  Check,
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { lineTotal, numericTransformer } from '@app/common';
import { Product } from '../catalog/product.entity';
import { Order } from './order.entity';

@Entity('order_items')
@Check('"quantity" >= 1')
export class OrderItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  orderId!: string;

  @ManyToOne(() => Order, (order) => order.items, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'orderId' })
  order?: Order;

  @Column({ type: 'varchar', length: 36 })
  productId!: string;

  @ManyToOne(() => Product, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'productId' })
  product?: Product;

  @Column('int')
  quantity!: number;

  // price at purchase time
  @Column('decimal', {
    precision: 10,
    scale: 2,
    transformer: numericTransformer,
  })
  unitPrice!: number;

  get totalPrice(): number {
    return lineTotal(this.unitPrice, this.quantity);
  }
}
