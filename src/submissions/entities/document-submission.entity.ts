import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { DocumentType } from '../../document-types/entities/document-type.entity';
import { Project } from '../../projects/entities/project.entity';
import { SubmissionStatus } from '../submission-status';

/**
 * One uploaded revision of a project's document. Revisions of the same
 * (project, document type) pair form a chain through `supersedesId`; the
 * highest version is the current one.
 */
@Entity('document_submissions')
@Unique(['projectId', 'documentTypeId', 'version'])
@Index(['projectId', 'documentTypeId'])
export class DocumentSubmission {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  projectId!: string;

  @ManyToOne(() => Project, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'projectId' })
  project?: Project;

  @Column({ type: 'uuid' })
  documentTypeId!: string;

  @ManyToOne(() => DocumentType, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'documentTypeId' })
  documentType?: DocumentType;

  @Column({ type: 'int' })
  version!: number;

  @Column({ type: 'uuid', nullable: true })
  supersedesId!: string | null;

  @ManyToOne(() => DocumentSubmission, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'supersedesId' })
  supersedes?: DocumentSubmission | null;

  @Column({ type: 'varchar', length: 200 })
  fileId!: string;

  @Column({ type: 'text' })
  fileUrl!: string;

  @Column({ type: 'uuid' })
  uploadedBy!: string;

  @Index()
  @Column({ type: 'enum', enum: SubmissionStatus, default: SubmissionStatus.PENDING_REVIEW })
  status!: SubmissionStatus;

  @Column({ default: false })
  isFinal!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  finalizedAt!: Date | null;

  @Column({ default: false })
  isLate!: boolean;

  @Column({ type: 'text', nullable: true })
  comments!: string | null;

  @Column({ type: 'text', nullable: true })
  reviewFeedback!: string | null;

  @Column({ type: 'uuid', nullable: true })
  reviewedBy!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  reviewedAt!: Date | null;

  @Column({ type: 'uuid', nullable: true })
  lockedBy!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  lockedAt!: Date | null;

  @Column({ type: 'timestamptz' })
  uploadedAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
