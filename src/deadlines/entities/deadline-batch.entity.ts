import { Column, CreateDateColumn, Entity, Index, OneToMany, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { ProjectDeadline } from './project-deadline.entity';

/** A named set of per-document deadlines shared by a cohort of projects. */
@Entity('deadline_batches')
export class DeadlineBatch {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ length: 150 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  appliesFrom!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  appliesUntil!: Date | null;

  @Column({ default: true })
  isActive!: boolean;

  @Column({ type: 'uuid' })
  createdBy!: string;

  @OneToMany(() => ProjectDeadline, (deadline) => deadline.batch)
  deadlines?: ProjectDeadline[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
