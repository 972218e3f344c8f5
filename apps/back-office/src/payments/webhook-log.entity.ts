import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';

@Entity('webhook_logs')
export class WebhookLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 50 })
  provider!: string;

  @Column({ length: 100 })
  eventType!: string;

  @Column('simple-json')
  payload!: Record<string, unknown>;

  @Column({ default: false })
  processed!: boolean;

  @Column({ type: 'varchar', length: 500, nullable: true })
  error!: string | null;

  @CreateDateColumn()
  receivedAt!: Date;
}
