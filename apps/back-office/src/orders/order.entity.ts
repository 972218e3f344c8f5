import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { ORDER_STATUSES, OrderStatus, numericTransformer } from '@app/common';
import { Coupon } from '../coupons/coupon.entity';
import { User } from '../users/user.entity';
import { OrderItem } from './order-item.entity';

const money = {
  precision: 10,
  scale: 2,
  default: 0,
  transformer: numericTransformer,
};

@Entity('orders')
@Index(['userId', 'status'])
export class Order {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  userId!: string;

  @ManyToOne(() => User, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  @Column({ type: 'simple-enum', enum: ORDER_STATUSES, default: 'pending' })
  status!: OrderStatus;

  @Column({ type: 'varchar', length: 36, nullable: true })
  couponId!: string | null;

  @ManyToOne(() => Coupon, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'couponId' })
  coupon?: Coupon | null;

  // percent at checkout; later coupon edits do not reprice the order
  @Column('int', { default: 0 })
  discountPercent!: number;

  @Column('text', { default: '' })
  shippingAddress!: string;

  @Column('decimal', money)
  subtotal!: number;

  @Column('decimal', money)
  discount!: number;

  @Column('decimal', money)
  totalPrice!: number;

  @OneToMany(() => OrderItem, (item) => item.order, { cascade: ['insert'] })
  items?: OrderItem[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @Column({ type: Date, nullable: true })
  completedAt!: Date | null;

  @Column({ type: Date, nullable: true })
  cancelledAt!: Date | null;
}
