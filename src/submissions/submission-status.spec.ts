import { InvalidStateError } from '../common/exceptions/domain.exceptions';
import { SubmissionStatus, assertTransition, canTransition, sourcesOf } from './submission-status';

describe('submission status transitions', () => {
  const allowed: Array<[SubmissionStatus, SubmissionStatus]> = [
    [SubmissionStatus.DRAFT, SubmissionStatus.PENDING_REVIEW],
    [SubmissionStatus.PENDING_REVIEW, SubmissionStatus.APPROVED],
    [SubmissionStatus.PENDING_REVIEW, SubmissionStatus.REVISION_REQUESTED],
    [SubmissionStatus.APPROVED, SubmissionStatus.LOCKED],
    [SubmissionStatus.LOCKED, SubmissionStatus.EVALUATED],
  ];

  it('permits exactly the listed moves', () => {
    const statuses = Object.values(SubmissionStatus);
    for (const from of statuses) {
      for (const to of statuses) {
        const expected = allowed.some(([a, b]) => a === from && b === to);
        expect(canTransition(from, to)).toBe(expected);
      }
    }
  });

  it('never leads from LOCKED back to PENDING_REVIEW', () => {
    expect(canTransition(SubmissionStatus.LOCKED, SubmissionStatus.PENDING_REVIEW)).toBe(false);
    expect(canTransition(SubmissionStatus.EVALUATED, SubmissionStatus.PENDING_REVIEW)).toBe(false);
  });

  it('lists the sources of a status', () => {
    expect(sourcesOf(SubmissionStatus.LOCKED)).toEqual([SubmissionStatus.APPROVED]);
  });

  it('reports the current and required status on a bad move', () => {
    let caught: unknown;
    try {
      assertTransition('sub-1', SubmissionStatus.PENDING_REVIEW, SubmissionStatus.LOCKED);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidStateError);
    expect(caught instanceof InvalidStateError && caught.getResponse()).toEqual({
      code: 'INVALID_STATE',
      message: 'Submission sub-1 is PENDING_REVIEW; expected APPROVED',
      details: { submissionId: 'sub-1', currentStatus: 'PENDING_REVIEW', requiredStatus: ['APPROVED'] },
    });
  });
});
