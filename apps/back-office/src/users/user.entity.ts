import {
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { USER_ROLES, UserRole } from '@app/common';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 150, unique: true })
  username!: string;

  @Column({ length: 254, unique: true })
  email!: string;

  @Column({ length: 150, default: '' })
  firstName!: string;

  @Column({ length: 150, default: '' })
  lastName!: string;

  @Column({ type: 'simple-enum', enum: USER_ROLES, default: 'customer' })
  role!: UserRole;

  @Column({ length: 15, default: '' })
  phone!: string;

  @Column('text', { default: '' })
  address!: string;

  @Column('int', { default: 0 })
  loyaltyPoints!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  dateJoined!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @DeleteDateColumn({ nullable: true })
  deletedAt!: Date | null;

  get displayName(): string {
    return `${this.username} (${this.role})`;
  }
}
