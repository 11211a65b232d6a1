import {
  InvalidStateError,
  UnauthorizedActionError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { SYSTEM_ACTOR } from '../common/types/actor';
import { DocumentType } from '../document-types/entities/document-type.entity';
import { Project } from '../projects/entities/project.entity';
import { FinalResult } from '../results/entities/final-result.entity';
import { DocumentSubmission } from '../submissions/entities/document-submission.entity';
import { SubmissionStatus } from '../submissions/submission-status';
import {
  TestContext,
  actors,
  approvedFinal,
  createTestContext,
  lockedSubmission,
  seedDocumentType,
  seedProject,
} from '../../test/support/test-context';
import { validateScore } from './marking.service';

describe('validateScore', () => {
  it('accepts two-decimal scores within 0..100', () => {
    expect(() => validateScore(0)).not.toThrow();
    expect(() => validateScore(100)).not.toThrow();
    expect(() => validateScore(72.25)).not.toThrow();
  });

  it('rejects out-of-range and over-precise scores', () => {
    expect(() => validateScore(-0.01)).toThrow(ValidationError);
    expect(() => validateScore(100.01)).toThrow(ValidationError);
    expect(() => validateScore(72.255)).toThrow(ValidationError);
    expect(() => validateScore(Number.NaN)).toThrow(ValidationError);
  });
});

describe('MarkingService', () => {
  let ctx: TestContext;
  let project: Project;
  let proposal: DocumentType;
  let submission: DocumentSubmission;

  const setup = async (env: Record<string, string> = {}) => {
    ctx = createTestContext(env);
    proposal = await seedDocumentType(ctx, 'PROPOSAL', 1);
    project = await seedProject(ctx);
    submission = await lockedSubmission(ctx, project, proposal);
  };

  const status = async () => (await ctx.submissions.findById(submission.id)).status;

  beforeEach(() => setup());

  describe('submitSupervisorMarks', () => {
    it('requires a locked submission', async () => {
      ctx = createTestContext();
      proposal = await seedDocumentType(ctx, 'PROPOSAL', 1);
      project = await seedProject(ctx);
      const approved = await approvedFinal(ctx, project, proposal);

      await expect(ctx.marking.submitSupervisorMarks(approved.id, 80, actors.supervisor)).rejects.toBeInstanceOf(
        InvalidStateError,
      );
    });

    it('is limited to the assigned supervisor', async () => {
      await expect(ctx.marking.submitSupervisorMarks(submission.id, 80, actors.otherSupervisor)).rejects.toBeInstanceOf(
        UnauthorizedActionError,
      );
      await expect(ctx.marking.submitSupervisorMarks(submission.id, 80, actors.evaluator)).rejects.toBeInstanceOf(
        UnauthorizedActionError,
      );
    });

    it('keeps only the latest mark', async () => {
      await ctx.marking.submitSupervisorMarks(submission.id, 70, actors.supervisor);
      const second = await ctx.marking.submitSupervisorMarks(submission.id, 75.5, actors.supervisor, ' Solid work ');

      const summary = await ctx.marking.getEvaluationSummary(submission.id, actors.supervisor);
      expect(second.comments).toBe('Solid work');
      expect(summary.supervisorScore).toBe(75.5);
      expect(summary.hasSupervisorMarks).toBe(true);
    });
  });

  describe('submitEvaluationMarks', () => {
    it('freezes a finalized evaluation', async () => {
      await ctx.marking.submitEvaluationMarks(submission.id, 90, true, actors.evaluator);

      await expect(
        ctx.marking.submitEvaluationMarks(submission.id, 95, false, actors.evaluator),
      ).rejects.toBeInstanceOf(InvalidStateError);
      expect((await ctx.marking.getMyEvaluation(submission.id, actors.evaluator))?.score).toBe(90);
    });

    it('lets an evaluator revise an unfinalized evaluation', async () => {
      await ctx.marking.submitEvaluationMarks(submission.id, 60, false, actors.evaluator);
      const revised = await ctx.marking.submitEvaluationMarks(submission.id, 65, false, actors.evaluator);

      expect(revised.score).toBe(65);
      expect(revised.isFinal).toBe(false);
    });

    it('is reserved for the evaluation committee', async () => {
      await expect(
        ctx.marking.submitEvaluationMarks(submission.id, 90, true, actors.supervisor),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('tells the FYP committee when an evaluation is finalized', async () => {
      ctx.dispatch.mockClear();
      await ctx.marking.submitEvaluationMarks(submission.id, 60, false, actors.evaluator);
      expect(ctx.dispatch).not.toHaveBeenCalled();

      await ctx.marking.submitEvaluationMarks(submission.id, 72.5, true, actors.evaluator);

      expect(ctx.dispatch).toHaveBeenCalledTimes(1);
      expect(ctx.dispatch).toHaveBeenCalledWith({
        type: 'EvaluationFinalized',
        recipients: [{ kind: 'role', role: 'FYP_COMMITTEE' }],
        submissionId: submission.id,
        projectId: project.id,
        evaluatorId: actors.evaluator.id,
        score: 72.5,
        finalizedEvaluators: 1,
        requiredEvaluators: 1,
      });
    });

    it('averages finalized evaluations only', async () => {
      await setup({ REQUIRED_EVALUATORS: '2' });
      await ctx.marking.submitEvaluationMarks(submission.id, 90, true, actors.evaluator);
      await ctx.marking.submitEvaluationMarks(submission.id, 50, false, actors.evaluator2);

      const summary = await ctx.marking.getEvaluationSummary(submission.id, actors.fypCommittee);

      expect(summary).toMatchObject({
        requiredEvaluators: 2,
        submittedEvaluators: 2,
        finalizedEvaluators: 1,
        averageScore: 90,
        allRequiredFinalized: false,
        complete: false,
      });
    });
  });

  describe('completion', () => {
    it('moves the submission to EVALUATED and computes the result', async () => {
      const finalizedAt = new Date('2026-04-01T08:00:00.000Z');
      await ctx.marking.submitSupervisorMarks(submission.id, 80, actors.supervisor);
      expect(await status()).toBe(SubmissionStatus.LOCKED);

      await ctx.marking.submitEvaluationMarks(submission.id, 90, true, actors.evaluator, undefined, finalizedAt);

      expect(await status()).toBe(SubmissionStatus.EVALUATED);
      const [result] = await ctx.dataSource.repository(FinalResult).findBy({ projectId: project.id });
      expect(result.totalScore).toBe(88);
      expect(result.computedBy).toBe(SYSTEM_ACTOR.id);
      expect(result.released).toBe(false);
      expect((await ctx.marking.getMyEvaluation(submission.id, actors.evaluator))?.finalizedAt).toEqual(finalizedAt);
    });

    it('waits for the configured number of evaluators', async () => {
      await setup({ REQUIRED_EVALUATORS: '2' });
      await ctx.marking.submitSupervisorMarks(submission.id, 80, actors.supervisor);
      await ctx.marking.submitEvaluationMarks(submission.id, 90, true, actors.evaluator);
      expect(await status()).toBe(SubmissionStatus.LOCKED);

      await ctx.marking.submitEvaluationMarks(submission.id, 85, true, actors.evaluator2);

      expect(await status()).toBe(SubmissionStatus.EVALUATED);
      const [result] = await ctx.dataSource.repository(FinalResult).findBy({ projectId: project.id });
      // committee average 87.5: (80 * 20 + 87.5 * 80) / 100
      expect(result.totalScore).toBe(86);
    });

    it('takes no further marks once evaluated', async () => {
      await ctx.marking.submitSupervisorMarks(submission.id, 80, actors.supervisor);
      await ctx.marking.submitEvaluationMarks(submission.id, 90, true, actors.evaluator);

      await expect(ctx.marking.submitSupervisorMarks(submission.id, 85, actors.supervisor)).rejects.toBeInstanceOf(
        InvalidStateError,
      );
      await expect(
        ctx.marking.submitEvaluationMarks(submission.id, 70, true, actors.evaluator2),
      ).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('getEvaluationSummary', () => {
    it('hides other projects from supervisors', async () => {
      await expect(
        ctx.marking.getEvaluationSummary(submission.id, actors.otherSupervisor),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('is not available to students', async () => {
      await expect(ctx.marking.getEvaluationSummary(submission.id, actors.leader)).rejects.toBeInstanceOf(
        UnauthorizedActionError,
      );
    });
  });
});
