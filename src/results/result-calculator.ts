import { divideHalfEven, fromHundredths, toHundredths } from '../common/utils/decimal';
import { ResultBreakdownItem } from './entities/final-result.entity';

export interface DocumentScoreInput {
  documentTypeId: string;
  docTypeCode: string;
  docTypeTitle: string;
  submissionId: string;
  supervisorScore: number;
  supervisorWeight: number;
  committeeAvgScore: number;
  committeeWeight: number;
  evaluatorCount: number;
}

/**
 * (supervisor * ws + committee * wc) / 100, computed in hundredths and
 * rounded half-even to two decimals.
 */
export function weightedDocumentScore(
  supervisorScore: number,
  supervisorWeight: number,
  committeeAvgScore: number,
  committeeWeight: number,
): number {
  const numerator = toHundredths(supervisorScore) * supervisorWeight + toHundredths(committeeAvgScore) * committeeWeight;
  return fromHundredths(divideHalfEven(numerator, 100));
}

export function calculateResult(inputs: readonly DocumentScoreInput[]): {
  totalScore: number;
  breakdown: ResultBreakdownItem[];
} {
  const breakdown = inputs.map((input) => ({
    ...input,
    weightedScore: weightedDocumentScore(
      input.supervisorScore,
      input.supervisorWeight,
      input.committeeAvgScore,
      input.committeeWeight,
    ),
  }));
  // Summed in hundredths; no re-normalization across documents.
  const total = breakdown.reduce((acc, item) => acc + toHundredths(item.weightedScore), 0);
  return { totalScore: fromHundredths(total), breakdown };
}
