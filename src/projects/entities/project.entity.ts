import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { DeadlineBatch } from '../../deadlines/entities/deadline-batch.entity';

/**
 * Read-side view of a project and its group. Projects, groups and supervisor
 * assignment are maintained elsewhere; this service never writes these rows.
 */
@Entity('projects')
export class Project {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 300 })
  title!: string;

  @Column({ type: 'uuid', nullable: true })
  supervisorId!: string | null;

  @Column({ type: 'uuid', nullable: true })
  leaderId!: string | null;

  // Student user ids of the project group.
  @Column({ type: 'simple-array', default: '' })
  memberIds!: string[];

  @Column({ type: 'uuid', nullable: true })
  deadlineBatchId!: string | null;

  @ManyToOne(() => DeadlineBatch, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'deadlineBatchId' })
  deadlineBatch?: DeadlineBatch | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
