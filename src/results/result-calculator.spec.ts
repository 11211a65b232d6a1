import { calculateResult, weightedDocumentScore } from './result-calculator';

describe('result calculator', () => {
  const doc = (code: string, supervisorScore: number, committeeAvgScore: number) => ({
    documentTypeId: `${code}-id`,
    docTypeCode: code,
    docTypeTitle: code,
    submissionId: `${code}-sub`,
    supervisorScore,
    supervisorWeight: 20,
    committeeAvgScore,
    committeeWeight: 80,
    evaluatorCount: 2,
  });

  it('weights supervisor and committee scores', () => {
    expect(weightedDocumentScore(80, 20, 90, 80)).toBe(88);
  });

  it('rounds half to even at the second decimal', () => {
    // 80.01 * 50 + 80.02 * 50 = 8001.5 hundredths -> 8002
    expect(weightedDocumentScore(80.01, 50, 80.02, 50)).toBe(80.02);
    // 80.01 * 50 + 80.00 * 50 = 8000.5 hundredths -> 8000
    expect(weightedDocumentScore(80.01, 50, 80, 50)).toBe(80);
  });

  it('sums weighted scores without re-normalizing', () => {
    const result = calculateResult([doc('PROPOSAL', 80, 90), doc('SRS', 70, 75.5)]);

    expect(result.breakdown.map((b) => b.weightedScore)).toEqual([88, 74.4]);
    expect(result.totalScore).toBe(162.4);
  });

  it('returns zero for no documents', () => {
    expect(calculateResult([])).toEqual({ totalScore: 0, breakdown: [] });
  });
});
