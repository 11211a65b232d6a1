import { InvalidStateError } from '../common/exceptions/domain.exceptions';

export enum SubmissionStatus {
  DRAFT = 'DRAFT',
  PENDING_REVIEW = 'PENDING_REVIEW',
  APPROVED = 'APPROVED',
  REVISION_REQUESTED = 'REVISION_REQUESTED',
  LOCKED = 'LOCKED',
  EVALUATED = 'EVALUATED',
}

/** Every permitted status move. Resubmission creates a new row instead. */
export const SUBMISSION_TRANSITIONS: Record<SubmissionStatus, readonly SubmissionStatus[]> = {
  [SubmissionStatus.DRAFT]: [SubmissionStatus.PENDING_REVIEW],
  [SubmissionStatus.PENDING_REVIEW]: [SubmissionStatus.APPROVED, SubmissionStatus.REVISION_REQUESTED],
  [SubmissionStatus.APPROVED]: [SubmissionStatus.LOCKED],
  [SubmissionStatus.REVISION_REQUESTED]: [],
  [SubmissionStatus.LOCKED]: [SubmissionStatus.EVALUATED],
  [SubmissionStatus.EVALUATED]: [],
};

export function canTransition(from: SubmissionStatus, to: SubmissionStatus): boolean {
  return SUBMISSION_TRANSITIONS[from].includes(to);
}

/** Statuses from which `to` can be reached in one move. */
export function sourcesOf(to: SubmissionStatus): SubmissionStatus[] {
  return Object.values(SubmissionStatus).filter((from) => canTransition(from, to));
}

export function assertTransition(submissionId: string, from: SubmissionStatus, to: SubmissionStatus): void {
  if (!canTransition(from, to)) {
    throw InvalidStateError.forSubmission(submissionId, from, sourcesOf(to));
  }
}

/** The submission has left the student's hands. */
export function isUnderEvaluation(status: SubmissionStatus): boolean {
  return status === SubmissionStatus.LOCKED || status === SubmissionStatus.EVALUATED;
}

/** Counts as satisfying an earlier step when sequential submission is enforced. */
export function isAccepted(status: SubmissionStatus): boolean {
  return status === SubmissionStatus.APPROVED || isUnderEvaluation(status);
}
