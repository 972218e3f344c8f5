import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import {
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
  PaymentMethod,
  PaymentStatus,
  numericTransformer,
} from '@app/common';
import { Order } from '../orders/order.entity';

@Entity('payments')
export class Payment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  orderId!: string;

  @ManyToOne(() => Order, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'orderId' })
  order?: Order;

  @Column('decimal', {
    precision: 10,
    scale: 2,
    transformer: numericTransformer,
  })
  amount!: number;

  @Column({ type: 'simple-enum', enum: PAYMENT_METHODS })
  method!: PaymentMethod;

  @Column({ type: 'simple-enum', enum: PAYMENT_STATUSES, default: 'pending' })
  status!: PaymentStatus; // pending, completed, failed

  // our id for the payment, sent to the gateway
  @Column({ length: 36, unique: true })
  reference!: string;

  @Column({ type: 'varchar', length: 100, nullable: true, unique: true })
  transactionId!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  failureReason!: string | null;

  @Column({ type: Date, nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
