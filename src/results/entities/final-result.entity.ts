import { Column, CreateDateColumn, Entity, JoinColumn, OneToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { Project } from '../../projects/entities/project.entity';

/** Per-document contribution, with the weights as they were at compute time. */
export interface ResultBreakdownItem {
  documentTypeId: string;
  docTypeCode: string;
  docTypeTitle: string;
  submissionId: string;
  supervisorScore: number;
  supervisorWeight: number;
  committeeAvgScore: number;
  committeeWeight: number;
  evaluatorCount: number;
  weightedScore: number;
}

@Entity('final_results')
export class FinalResult {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', unique: true })
  projectId!: string;

  @OneToOne(() => Project, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'projectId' })
  project?: Project;

  @Column({ type: 'decimal', precision: 7, scale: 2, transformer: decimalTransformer })
  totalScore!: number;

  @Column({ type: 'jsonb' })
  breakdown!: ResultBreakdownItem[];

  @Column({ default: false })
  released!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  releasedAt!: Date | null;

  @Column({ type: 'uuid', nullable: true })
  releasedBy!: string | null;

  @Column({ type: 'uuid' })
  computedBy!: string;

  @Column({ type: 'timestamptz' })
  computedAt!: Date;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
