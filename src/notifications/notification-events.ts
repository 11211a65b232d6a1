import { Role } from '../common/types/permissions';

export type Recipient = { kind: 'user'; userId: string } | { kind: 'role'; role: Role };

export const toUser = (userId: string): Recipient => ({ kind: 'user', userId });
export const toRole = (role: Role): Recipient => ({ kind: 'role', role });

export type NotificationEvent =
  | {
      type: 'SubmissionUploaded';
      recipients: Recipient[];
      submissionId: string;
      projectId: string;
      documentTypeTitle: string;
      version: number;
      isLate: boolean;
    }
  | {
      type: 'SubmissionReviewed';
      recipients: Recipient[];
      submissionId: string;
      projectId: string;
      documentTypeTitle: string;
      approved: boolean;
      feedback: string | null;
    }
  | {
      type: 'SubmissionLocked';
      recipients: Recipient[];
      submissionId: string;
      projectId: string;
      documentTypeTitle: string;
      automatic: boolean;
    }
  | {
      type: 'EvaluationFinalized';
      recipients: Recipient[];
      submissionId: string;
      projectId: string;
      evaluatorId: string;
      score: number;
      finalizedEvaluators: number;
      requiredEvaluators: number;
    }
  | {
      type: 'ResultReleased';
      recipients: Recipient[];
      projectId: string;
      totalScore: number;
    }
  | {
      type: 'DeadlineApproaching';
      recipients: Recipient[];
      projectId: string;
      documentTypeTitle: string;
      deadlineDate: Date;
    }
  | {
      type: 'DeadlinePassed';
      recipients: Recipient[];
      projectId: string;
      documentTypeTitle: string;
      deadlineDate: Date;
    };

export type NotificationEventType = NotificationEvent['type'];

export interface NotificationContent {
  title: string;
  message: string;
  priority: 'low' | 'medium' | 'high';
}

export function describeNotification(event: NotificationEvent): NotificationContent {
  switch (event.type) {
    case 'SubmissionUploaded':
      return {
        title: `${event.documentTypeTitle} submitted`,
        message: `Version ${event.version} of ${event.documentTypeTitle} is waiting for review${event.isLate ? ' (late)' : ''}.`,
        priority: 'medium',
      };
    case 'SubmissionReviewed':
      return event.approved
        ? {
            title: `${event.documentTypeTitle} approved`,
            message: `Your supervisor approved ${event.documentTypeTitle}.`,
            priority: 'medium',
          }
        : {
            title: `Revision requested for ${event.documentTypeTitle}`,
            message: event.feedback ?? `Your supervisor requested changes to ${event.documentTypeTitle}.`,
            priority: 'high',
          };
    case 'SubmissionLocked':
      return {
        title: `${event.documentTypeTitle} locked`,
        message: event.automatic
          ? `${event.documentTypeTitle} was locked automatically at its deadline and is now with the evaluation committee.`
          : `${event.documentTypeTitle} was locked and is now with the evaluation committee.`,
        priority: 'medium',
      };
    case 'EvaluationFinalized':
      return {
        title: 'Evaluation finalized',
        message: `An evaluator finalized a score of ${event.score.toFixed(2)} (${event.finalizedEvaluators} of ${event.requiredEvaluators} required).`,
        priority: 'low',
      };
    case 'ResultReleased':
      return {
        title: 'Final result released',
        message: `Your project's final result is available: ${event.totalScore.toFixed(2)}.`,
        priority: 'high',
      };
    case 'DeadlineApproaching':
      return {
        title: `${event.documentTypeTitle} due soon`,
        message: `${event.documentTypeTitle} is due on ${event.deadlineDate.toISOString()}.`,
        priority: 'medium',
      };
    case 'DeadlinePassed':
      return {
        title: `${event.documentTypeTitle} deadline passed`,
        message: `The deadline for ${event.documentTypeTitle} passed on ${event.deadlineDate.toISOString()} without an approved submission.`,
        priority: 'high',
      };
  }
}
