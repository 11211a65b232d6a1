import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';
import { SubmissionStatus } from '../submission-status';

/** Opaque reference to a file held by the file store. */
export interface FileReference {
  fileId: string;
  fileUrl: string;
}

export class CreateSubmissionDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  projectId!: string;

  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  documentTypeId!: string;

  @ApiProperty({ example: 'files/7f3c2a' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  fileId!: string;

  @ApiProperty({ example: 'https://files.example.org/7f3c2a' })
  @IsString()
  @IsNotEmpty()
  fileUrl!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  comments?: string;

  @ApiPropertyOptional({ description: 'Keep the upload as a draft until submitted' })
  @IsOptional()
  @IsBoolean()
  draft?: boolean;
}

export class ReviewSubmissionDto {
  @ApiProperty()
  @IsBoolean()
  approve!: boolean;

  @ApiPropertyOptional({ description: 'Required when requesting a revision' })
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  feedback?: string;
}

export interface SubmissionView {
  id: string;
  projectId: string;
  documentTypeId: string;
  documentTypeCode: string;
  documentTypeTitle: string;
  version: number;
  supersedesId: string | null;
  isCurrent: boolean;
  status: SubmissionStatus;
  fileId: string;
  fileUrl: string;
  uploadedBy: string;
  uploadedAt: Date;
  comments: string | null;
  reviewFeedback: string | null;
  reviewedBy: string | null;
  reviewedAt: Date | null;
  isFinal: boolean;
  finalizedAt: Date | null;
  lockedBy: string | null;
  lockedAt: Date | null;
  isLate: boolean;
  deadlineDate: Date | null;
  deadlinePassed: boolean;
}

export interface PassedDeadlineReport {
  processedDeadlines: number;
  locked: number;
  notified: number;
}
