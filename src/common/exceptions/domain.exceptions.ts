import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { Capability } from '../types/permissions';

export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'INVALID_STATE'
  | 'SCHEDULING_CONFLICT'
  | 'NOT_FOUND';

export type ErrorDetails = Record<string, string | number | boolean | null | string[]>;

export interface DomainErrorBody {
  code: DomainErrorCode;
  message: string;
  details?: ErrorDetails;
}

export function isDomainErrorBody(value: unknown): value is DomainErrorBody {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

export class ValidationError extends BadRequestException {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, details?: ErrorDetails) {
    super({ code: 'VALIDATION_ERROR', message, details } satisfies DomainErrorBody);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedActionError extends ForbiddenException {
  readonly code = 'UNAUTHORIZED';

  constructor(message: string, details?: ErrorDetails) {
    super({ code: 'UNAUTHORIZED', message, details } satisfies DomainErrorBody);
    this.name = 'UnauthorizedActionError';
  }

  static missingCapability(capability: Capability, role: string): UnauthorizedActionError {
    return new UnauthorizedActionError(`Role ${role} may not ${capability.replace(/_/g, ' ')}`, {
      capability,
      role,
    });
  }
}

export class InvalidStateError extends ConflictException {
  readonly code = 'INVALID_STATE';

  constructor(message: string, details?: ErrorDetails) {
    super({ code: 'INVALID_STATE', message, details } satisfies DomainErrorBody);
    this.name = 'InvalidStateError';
  }

  static forSubmission(
    submissionId: string,
    currentStatus: string,
    requiredStatus: string[],
    message?: string,
  ): InvalidStateError {
    return new InvalidStateError(
      message ?? `Submission ${submissionId} is ${currentStatus}; expected ${requiredStatus.join(' or ')}`,
      { submissionId, currentStatus, requiredStatus },
    );
  }
}

export class SchedulingConflictError extends ConflictException {
  readonly code = 'SCHEDULING_CONFLICT';

  constructor(message: string, details?: ErrorDetails) {
    super({ code: 'SCHEDULING_CONFLICT', message, details } satisfies DomainErrorBody);
    this.name = 'SchedulingConflictError';
  }
}

export class NotFoundError extends NotFoundException {
  readonly code = 'NOT_FOUND';

  constructor(entity: string, id: string) {
    super({ code: 'NOT_FOUND', message: `${entity} not found`, details: { entity, id } } satisfies DomainErrorBody);
    this.name = 'NotFoundError';
  }
}
