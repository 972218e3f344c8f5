import {
  Check,
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { LocalizedText, numericTransformer } from '@app/common';
import { Category } from './category.entity';
import { ProductImage } from './product-image.entity';
import { ProductVideo } from './product-video.entity';

@Entity('products')
@Check('"quantity" >= 0')
@Check('"price" >= 0')
export class Product {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('simple-json')
  name!: LocalizedText;

  @Column('simple-json', { nullable: true })
  description!: LocalizedText | null;

  @Column({ length: 64, unique: true })
  sku!: string;

  @Column('decimal', {
    precision: 10,
    scale: 2,
    transformer: numericTransformer,
  })
  price!: number;

  @Column('int', { default: 0 })
  quantity!: number;

  @Column('simple-array', { default: '' })
  tags!: string[];

  @Column({ type: 'varchar', length: 36 })
  categoryId!: string;

  @ManyToOne(() => Category, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'categoryId' })
  category?: Category;

  @Column({ default: true })
  isActive!: boolean;

  // mean of approved reviews, kept current by the review listener
  @Column('decimal', {
    precision: 3,
    scale: 2,
    default: 0,
    transformer: numericTransformer,
  })
  rating!: number;

  @Column('int', { default: 0 })
  reviewCount!: number;

  @OneToMany(() => ProductImage, (image) => image.product)
  images?: ProductImage[];

  @OneToMany(() => ProductVideo, (video) => video.product)
  videos?: ProductVideo[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @DeleteDateColumn({ nullable: true })
  deletedAt!: Date | null;
}
