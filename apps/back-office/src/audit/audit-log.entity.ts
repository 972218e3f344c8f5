import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { AUDIT_ACTIONS, AuditAction } from '@app/common';

/** Append-only record of a change made through the back office. */
@Entity('admin_audit_logs')
@Index(['entityType', 'entityId'])
export class AdminAuditLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36, nullable: true })
  actorId!: string | null;

  @Column({ type: 'simple-enum', enum: AUDIT_ACTIONS })
  action!: AuditAction;

  @Column({ length: 50 })
  entityType!: string;

  @Column({ length: 64 })
  entityId!: string;

  @Column('simple-json', { nullable: true })
  changes!: Record<string, unknown> | null;

  @CreateDateColumn()
  createdAt!: Date;
}
