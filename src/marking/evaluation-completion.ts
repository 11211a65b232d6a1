import { averageHalfEven } from '../common/utils/decimal';

interface MarkRow {
  score: number;
  isFinal: boolean;
}

export interface EvaluationTally {
  requiredEvaluators: number;
  submittedEvaluators: number;
  finalizedEvaluators: number;
  /** Mean of finalized scores only, half-even to two decimals. */
  averageScore: number | null;
  hasSupervisorMarks: boolean;
  allRequiredFinalized: boolean;
  complete: boolean;
}

/**
 * The single definition of "evaluation complete": supervisor marks exist and
 * at least `requiredEvaluators` committee members have finalized.
 */
export function tallyEvaluation(
  supervisorMarks: { score: number } | null,
  evaluations: readonly MarkRow[],
  requiredEvaluators: number,
): EvaluationTally {
  const finalized = evaluations.filter((e) => e.isFinal);
  const allRequiredFinalized = finalized.length >= requiredEvaluators;
  return {
    requiredEvaluators,
    submittedEvaluators: evaluations.length,
    finalizedEvaluators: finalized.length,
    averageScore: averageHalfEven(finalized.map((e) => e.score)),
    hasSupervisorMarks: supervisorMarks !== null,
    allRequiredFinalized,
    complete: supervisorMarks !== null && allRequiredFinalized,
  };
}

export function isEvaluationComplete(
  supervisorMarks: { score: number } | null,
  evaluations: readonly MarkRow[],
  requiredEvaluators: number,
): boolean {
  return tallyEvaluation(supervisorMarks, evaluations, requiredEvaluators).complete;
}
