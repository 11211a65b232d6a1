import { SchedulingConflictError } from '../common/exceptions/domain.exceptions';
import { MS_PER_DAY, isApproaching, isPast, validateDeadlineSchedule } from './deadline-rules';

describe('deadline rules', () => {
  const t = new Date('2026-01-10T12:00:00.000Z');
  const plusDays = (days: number) => new Date(t.getTime() + days * MS_PER_DAY);

  describe('isPast', () => {
    it('is false at the deadline instant and true afterwards', () => {
      expect(isPast(t, t)).toBe(false);
      expect(isPast(t, new Date(t.getTime() + 1))).toBe(true);
    });
  });

  describe('isApproaching', () => {
    it('is true inside the window', () => {
      expect(isApproaching(t, 48, new Date(t.getTime() - 47 * 3600_000))).toBe(true);
    });

    it('is false outside the window', () => {
      expect(isApproaching(t, 48, new Date(t.getTime() - 49 * 3600_000))).toBe(false);
    });

    it('is false once the deadline has passed', () => {
      expect(isApproaching(t, 48, plusDays(1))).toBe(false);
    });
  });

  describe('validateDeadlineSchedule', () => {
    const entry = (code: string, displayOrder: number, deadlineDate: Date) => ({
      documentTypeId: `${code}-id`,
      code,
      displayOrder,
      deadlineDate,
    });

    it('accepts deadlines exactly the minimum gap apart', () => {
      const schedule = validateDeadlineSchedule([entry('PROPOSAL', 1, t), entry('SRS', 2, plusDays(15))], 15);

      expect(schedule.map((d) => [d.code, d.sortOrder])).toEqual([
        ['PROPOSAL', 1],
        ['SRS', 2],
      ]);
    });

    it('rejects deadlines closer than the minimum gap', () => {
      expect(() => validateDeadlineSchedule([entry('PROPOSAL', 1, t), entry('SRS', 2, plusDays(14))], 15)).toThrow(
        SchedulingConflictError,
      );
    });

    it('rejects a gap one millisecond short of the minimum', () => {
      const almost = new Date(plusDays(15).getTime() - 1);
      expect(() => validateDeadlineSchedule([entry('PROPOSAL', 1, t), entry('SRS', 2, almost)], 15)).toThrow(
        SchedulingConflictError,
      );
    });

    it('orders by display order before comparing', () => {
      expect(() =>
        validateDeadlineSchedule([entry('SRS', 2, t), entry('PROPOSAL', 1, plusDays(20))], 15),
      ).toThrow('Deadline for SRS must be after the deadline for PROPOSAL');
    });

    it('reports the offending pair and gap', () => {
      let caught: unknown;
      try {
        validateDeadlineSchedule([entry('PROPOSAL', 1, t), entry('SRS', 2, plusDays(10))], 15);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchedulingConflictError);
      expect(caught instanceof SchedulingConflictError && caught.getResponse()).toEqual({
        code: 'SCHEDULING_CONFLICT',
        message: 'Deadlines for PROPOSAL and SRS must be at least 15 days apart',
        details: { previous: 'PROPOSAL', next: 'SRS', gapDays: 10, minGapDays: 15 },
      });
    });

    it('accepts a single deadline', () => {
      expect(validateDeadlineSchedule([entry('PROPOSAL', 1, t)], 15)).toHaveLength(1);
    });
  });
});
