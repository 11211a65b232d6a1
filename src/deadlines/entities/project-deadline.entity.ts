import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { DocumentType } from '../../document-types/entities/document-type.entity';
import { DeadlineBatch } from './deadline-batch.entity';

@Entity('project_deadlines')
@Unique(['batchId', 'documentTypeId'])
export class ProjectDeadline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  batchId!: string;

  @ManyToOne(() => DeadlineBatch, (batch) => batch.deadlines, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'batchId' })
  batch?: DeadlineBatch;

  @Column({ type: 'uuid' })
  documentTypeId!: string;

  @ManyToOne(() => DocumentType, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'documentTypeId' })
  documentType?: DocumentType;

  @Column({ type: 'timestamptz' })
  deadlineDate!: Date;

  // Mirrors the document type's displayOrder when the schedule was set.
  @Column({ type: 'int' })
  sortOrder!: number;

  @Column({ type: 'timestamptz', nullable: true })
  reminderSentAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  passedProcessedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}
