import { isEvaluationComplete, tallyEvaluation } from './evaluation-completion';

describe('tallyEvaluation', () => {
  const supervisor = { score: 80 };

  it('averages finalized rows only', () => {
    const tally = tallyEvaluation(
      supervisor,
      [
        { score: 85, isFinal: true },
        { score: 90, isFinal: true },
        { score: 10, isFinal: false },
      ],
      2,
    );

    expect(tally).toEqual({
      requiredEvaluators: 2,
      submittedEvaluators: 3,
      finalizedEvaluators: 2,
      averageScore: 87.5,
      hasSupervisorMarks: true,
      allRequiredFinalized: true,
      complete: true,
    });
  });

  it('rounds the average half-even', () => {
    const tally = tallyEvaluation(
      supervisor,
      [
        { score: 85, isFinal: true },
        { score: 90, isFinal: true },
        { score: 88, isFinal: true },
      ],
      1,
    );

    expect(tally.averageScore).toBe(87.67);
  });

  it('is incomplete without supervisor marks', () => {
    expect(isEvaluationComplete(null, [{ score: 90, isFinal: true }], 1)).toBe(false);
  });

  it('is incomplete until enough evaluators finalize', () => {
    const rows = [
      { score: 90, isFinal: true },
      { score: 70, isFinal: false },
    ];

    expect(isEvaluationComplete(supervisor, rows, 2)).toBe(false);
    expect(isEvaluationComplete(supervisor, rows, 1)).toBe(true);
  });

  it('reports no average when nothing is finalized', () => {
    expect(tallyEvaluation(supervisor, [{ score: 70, isFinal: false }], 1).averageScore).toBeNull();
  });
});
