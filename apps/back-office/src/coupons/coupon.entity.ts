import {
  Check,
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('coupons')
@Check('"discountPercent" BETWEEN 1 AND 100')
export class Coupon {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // stored upper-cased
  @Column({ length: 50, unique: true })
  code!: string;

  @Column('int')
  discountPercent!: number;

  @Column()
  validFrom!: Date;

  @Column()
  validTo!: Date;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @DeleteDateColumn({ nullable: true })
  deletedAt!: Date | null;
}

export function isCouponValid(coupon: Coupon, at: Date = new Date()): boolean {
  return (
    coupon.isActive &&
    coupon.validFrom.getTime() <= at.getTime() &&
    at.getTime() <= coupon.validTo.getTime()
  );
}
