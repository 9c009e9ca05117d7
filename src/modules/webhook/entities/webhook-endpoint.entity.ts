import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('webhook_endpoints')
export class WebhookEndpointEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 500 })
  url!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  secret!: string | null;

  @Column({ name: 'event_types', type: 'jsonb' })
  eventTypes!: string[];

  @Index()
  @Column({ default: true })
  active!: boolean;

  @Column({ name: 'timeout_seconds', type: 'int', default: 30 })
  timeoutSeconds!: number;

  @Column({ name: 'max_retries', type: 'int', default: 3 })
  maxRetries!: number;

  // null: global endpoint, receives events of every tenant
  @Index()
  @Column({ name: 'tenant_id', type: 'int', nullable: true })
  tenantId!: number | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
