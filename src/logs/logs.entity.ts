import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { AuditModule } from './audit-events';

export interface LogActor {
  id: string;
  role: string;
  name?: string | null;
  email?: string | null;
}

export type LogDetails = Record<string, string | number | boolean | string[]>;

@Entity('logs')
export class Log {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 100 })
  action!: string;

  @Column({ type: 'varchar', length: 50 })
  module!: AuditModule;

  @Column({ type: 'enum', enum: ['info', 'warn', 'error'], default: 'info' })
  level!: 'info' | 'warn' | 'error';

  @Column('jsonb', { nullable: true })
  performedBy!: LogActor | null;

  @Index()
  @Column({ type: 'uuid', nullable: true })
  entityId!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  entityType!: string | null;

  @Column('jsonb', { nullable: true })
  details!: LogDetails | null;

  @Column({ type: 'varchar', length: 64, nullable: true })
  requestId!: string | null;

  @Column({ type: 'varchar', length: 64, nullable: true })
  ipAddress!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  userAgent!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  timestamp!: Date;
}
