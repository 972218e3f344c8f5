import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { STOCK_REASONS, StockReason } from '@app/common';

/** Append-only ledger of quantity changes. Rows are never updated. */
@Entity('stock_history')
@Index(['productId', 'createdAt'])
export class StockHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  productId!: string;

  @Column('int')
  change!: number;

  @Column('int')
  quantityAfter!: number;

  @Column({ type: 'simple-enum', enum: STOCK_REASONS })
  reason!: StockReason;

  @Column({ type: 'varchar', length: 100, nullable: true })
  reference!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
