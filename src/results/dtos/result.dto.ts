import { SubmissionStatus } from '../../submissions/submission-status';
import { FinalResult } from '../entities/final-result.entity';

export type PendingReason = 'NO_SUBMISSION' | 'NOT_LOCKED' | 'EVALUATION_INCOMPLETE';

export interface PendingDocument {
  documentTypeId: string;
  docTypeCode: string;
  submissionId: string | null;
  status: SubmissionStatus | null;
  reason: PendingReason;
}

export type ComputeOutcome =
  | { status: 'COMPUTED'; result: FinalResult }
  | { status: 'NOT_READY'; projectId: string; pending: PendingDocument[] };
