import { SchedulingConflictError } from '../common/exceptions/domain.exceptions';

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export interface ScheduleEntry {
  documentTypeId: string;
  code: string;
  displayOrder: number;
  deadlineDate: Date;
}

export interface ScheduledDeadline extends ScheduleEntry {
  sortOrder: number;
}

export function isPast(deadlineDate: Date, now: Date): boolean {
  return now.getTime() > deadlineDate.getTime();
}

/** True while the deadline is still ahead but falls within the next `withinHours`. */
export function isApproaching(deadlineDate: Date, withinHours: number, now: Date): boolean {
  if (isPast(deadlineDate, now)) return false;
  return now.getTime() + withinHours * MS_PER_HOUR > deadlineDate.getTime();
}

function formatDays(ms: number): number {
  return Math.floor((ms / MS_PER_DAY) * 100) / 100;
}

/**
 * Orders the entries by document display order and checks that each deadline
 * falls at least `minGapDays` full days after the previous one.
 */
export function validateDeadlineSchedule(entries: ScheduleEntry[], minGapDays: number): ScheduledDeadline[] {
  const ordered = [...entries].sort(
    (a, b) => a.displayOrder - b.displayOrder || a.code.localeCompare(b.code),
  );
  const minGapMs = minGapDays * MS_PER_DAY;

  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    const next = ordered[i];
    const gapMs = next.deadlineDate.getTime() - previous.deadlineDate.getTime();
    if (gapMs <= 0) {
      throw new SchedulingConflictError(
        `Deadline for ${next.code} must be after the deadline for ${previous.code}`,
        { previous: previous.code, next: next.code, gapDays: formatDays(gapMs), minGapDays },
      );
    }
    if (gapMs < minGapMs) {
      throw new SchedulingConflictError(
        `Deadlines for ${previous.code} and ${next.code} must be at least ${minGapDays} days apart`,
        { previous: previous.code, next: next.code, gapDays: formatDays(gapMs), minGapDays },
      );
    }
  }

  return ordered.map((entry) => ({ ...entry, sortOrder: entry.displayOrder }));
}
