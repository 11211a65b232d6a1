import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { DocumentSubmission } from '../../submissions/entities/document-submission.entity';

/** One committee member's score for a locked submission. */
@Entity('evaluation_marks')
@Unique(['submissionId', 'evaluatorId'])
export class EvaluationMarks {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  submissionId!: string;

  @ManyToOne(() => DocumentSubmission, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'submissionId' })
  submission?: DocumentSubmission;

  @Column({ type: 'uuid' })
  evaluatorId!: string;

  @Column({ type: 'decimal', precision: 5, scale: 2, transformer: decimalTransformer })
  score!: number;

  @Column({ type: 'text', nullable: true })
  comments!: string | null;

  // Frozen once true; only finalized rows count toward the result.
  @Column({ default: false })
  isFinal!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  finalizedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
