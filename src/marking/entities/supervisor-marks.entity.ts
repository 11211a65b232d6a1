import { Column, CreateDateColumn, Entity, JoinColumn, OneToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { DocumentSubmission } from '../../submissions/entities/document-submission.entity';

@Entity('supervisor_marks')
export class SupervisorMarks {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', unique: true })
  submissionId!: string;

  @OneToOne(() => DocumentSubmission, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'submissionId' })
  submission?: DocumentSubmission;

  @Column({ type: 'uuid' })
  supervisorId!: string;

  @Column({ type: 'decimal', precision: 5, scale: 2, transformer: decimalTransformer })
  score!: number;

  @Column({ type: 'text', nullable: true })
  comments!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
