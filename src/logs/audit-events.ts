export type AuditModule = 'DOCUMENT_TYPES' | 'DEADLINES' | 'SUBMISSIONS' | 'MARKING' | 'RESULTS';

export type AuditEvent =
  | { action: 'DOCUMENT_TYPE_CREATED'; details: { code: string; supervisorWeight: number; committeeWeight: number } }
  | { action: 'DOCUMENT_TYPE_UPDATED'; details: { changedFields: string[] } }
  | { action: 'DOCUMENT_TYPE_ACTIVATION_CHANGED'; details: { active: boolean } }
  | { action: 'DEADLINE_BATCH_CREATED'; details: { name: string; deadlineCount: number } }
  | { action: 'DEADLINE_BATCH_DEACTIVATED'; details: { name: string } }
  | { action: 'DEADLINES_SET'; details: { deadlineCount: number } }
  | {
      action: 'SUBMISSION_CREATED';
      details: { projectId: string; documentTypeId: string; version: number; isLate: boolean; draft: boolean };
    }
  | { action: 'SUBMISSION_SUBMITTED'; details: { projectId: string } }
  | { action: 'SUBMISSION_REVIEWED'; details: { projectId: string; approved: boolean } }
  | { action: 'SUBMISSION_MARKED_FINAL'; details: { projectId: string } }
  | { action: 'SUBMISSION_LOCKED'; details: { projectId: string; automatic: boolean } }
  | { action: 'SUBMISSION_EVALUATED'; details: { projectId: string } }
  | { action: 'SUPERVISOR_MARKS_SUBMITTED'; details: { submissionId: string; score: number } }
  | { action: 'EVALUATION_MARKS_SUBMITTED'; details: { submissionId: string; score: number; finalized: boolean } }
  | { action: 'RESULT_COMPUTED'; details: { totalScore: number; documentCount: number } }
  | { action: 'RESULT_RELEASED'; details: { totalScore: number } };

export type AuditAction = AuditEvent['action'];

interface AuditTarget {
  module: AuditModule;
  entityType: string;
}

export const AUDIT_TARGETS: Record<AuditAction, AuditTarget> = {
  DOCUMENT_TYPE_CREATED: { module: 'DOCUMENT_TYPES', entityType: 'DocumentType' },
  DOCUMENT_TYPE_UPDATED: { module: 'DOCUMENT_TYPES', entityType: 'DocumentType' },
  DOCUMENT_TYPE_ACTIVATION_CHANGED: { module: 'DOCUMENT_TYPES', entityType: 'DocumentType' },
  DEADLINE_BATCH_CREATED: { module: 'DEADLINES', entityType: 'DeadlineBatch' },
  DEADLINE_BATCH_DEACTIVATED: { module: 'DEADLINES', entityType: 'DeadlineBatch' },
  DEADLINES_SET: { module: 'DEADLINES', entityType: 'DeadlineBatch' },
  SUBMISSION_CREATED: { module: 'SUBMISSIONS', entityType: 'DocumentSubmission' },
  SUBMISSION_SUBMITTED: { module: 'SUBMISSIONS', entityType: 'DocumentSubmission' },
  SUBMISSION_REVIEWED: { module: 'SUBMISSIONS', entityType: 'DocumentSubmission' },
  SUBMISSION_MARKED_FINAL: { module: 'SUBMISSIONS', entityType: 'DocumentSubmission' },
  SUBMISSION_LOCKED: { module: 'SUBMISSIONS', entityType: 'DocumentSubmission' },
  SUBMISSION_EVALUATED: { module: 'MARKING', entityType: 'DocumentSubmission' },
  SUPERVISOR_MARKS_SUBMITTED: { module: 'MARKING', entityType: 'SupervisorMarks' },
  EVALUATION_MARKS_SUBMITTED: { module: 'MARKING', entityType: 'EvaluationMarks' },
  RESULT_COMPUTED: { module: 'RESULTS', entityType: 'FinalResult' },
  RESULT_RELEASED: { module: 'RESULTS', entityType: 'FinalResult' },
};
