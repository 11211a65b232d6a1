// src/common/types/permissions.ts
export enum Role {
  STUDENT = 'STUDENT',
  SUPERVISOR = 'SUPERVISOR',
  EVALUATION_COMMITTEE = 'EVALUATION_COMMITTEE',
  FYP_COMMITTEE = 'FYP_COMMITTEE',
  ADMIN = 'ADMIN',
  // Scheduled jobs and automatic follow-ups run as this role.
  SYSTEM = 'SYSTEM',
}

export enum Capability {
  SUBMIT_DOCUMENT = 'submit_document',
  MARK_FINAL = 'mark_final',
  REVIEW_SUBMISSION = 'review_submission',
  LOCK_SUBMISSION = 'lock_submission',
  SUBMIT_SUPERVISOR_MARKS = 'submit_supervisor_marks',
  SUBMIT_EVALUATION_MARKS = 'submit_evaluation_marks',
  VIEW_EVALUATION_SUMMARY = 'view_evaluation_summary',
  COMPUTE_RESULT = 'compute_result',
  RELEASE_RESULT = 'release_result',
  VIEW_RESULT = 'view_result',
  VIEW_RELEASED_RESULT = 'view_released_result',
  MANAGE_DEADLINES = 'manage_deadlines',
  MANAGE_DOCUMENT_TYPES = 'manage_document_types',
  VIEW_SUBMISSIONS = 'view_submissions',
}

export const RoleCapabilities: Record<Role, readonly Capability[]> = {
  [Role.STUDENT]: [
    Capability.SUBMIT_DOCUMENT,
    Capability.MARK_FINAL,
    Capability.VIEW_RELEASED_RESULT,
    Capability.VIEW_SUBMISSIONS,
  ],
  [Role.SUPERVISOR]: [
    Capability.REVIEW_SUBMISSION,
    Capability.SUBMIT_SUPERVISOR_MARKS,
    Capability.VIEW_EVALUATION_SUMMARY,
    Capability.VIEW_SUBMISSIONS,
  ],
  [Role.EVALUATION_COMMITTEE]: [
    Capability.LOCK_SUBMISSION,
    Capability.SUBMIT_EVALUATION_MARKS,
    Capability.VIEW_EVALUATION_SUMMARY,
    Capability.COMPUTE_RESULT,
    Capability.RELEASE_RESULT,
    Capability.VIEW_RESULT,
    Capability.VIEW_RELEASED_RESULT,
    Capability.VIEW_SUBMISSIONS,
  ],
  [Role.FYP_COMMITTEE]: [
    Capability.MANAGE_DEADLINES,
    Capability.MANAGE_DOCUMENT_TYPES,
    Capability.VIEW_EVALUATION_SUMMARY,
    Capability.COMPUTE_RESULT,
    Capability.VIEW_RESULT,
    Capability.VIEW_RELEASED_RESULT,
    Capability.VIEW_SUBMISSIONS,
  ],
  [Role.ADMIN]: [
    Capability.MANAGE_DEADLINES,
    Capability.MANAGE_DOCUMENT_TYPES,
    Capability.VIEW_EVALUATION_SUMMARY,
    Capability.VIEW_RESULT,
    Capability.VIEW_RELEASED_RESULT,
    Capability.VIEW_SUBMISSIONS,
  ],
  [Role.SYSTEM]: [Capability.LOCK_SUBMISSION, Capability.COMPUTE_RESULT],
};

const ROLE_VALUES: readonly string[] = Object.values(Role);

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLE_VALUES.includes(value);
}

export function hasCapability(role: Role, capability: Capability): boolean {
  return RoleCapabilities[role].includes(capability);
}

export function hasAnyCapability(role: Role, capabilities: readonly Capability[]): boolean {
  return capabilities.some((c) => hasCapability(role, c));
}
