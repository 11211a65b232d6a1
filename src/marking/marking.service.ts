import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import {
  InvalidStateError,
  NotFoundError,
  UnauthorizedActionError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { assertCapability } from '../common/guards/capabilities';
import { Actor, SYSTEM_ACTOR } from '../common/types/actor';
import { Capability, Role } from '../common/types/permissions';
import { hasAtMostTwoDecimals } from '../common/utils/decimal';
import { SystemLoggingService } from '../logs/system-logging.service';
import { NotificationService } from '../notifications/notification.service';
import { toRole } from '../notifications/notification-events';
import { ProjectsService } from '../projects/projects.service';
import { ResultsService } from '../results/results.service';
import { SettingsService } from '../settings/settings.service';
import { DocumentSubmission } from '../submissions/entities/document-submission.entity';
import { SubmissionStatus, assertTransition } from '../submissions/submission-status';
import { EvaluationSummary } from './dtos/marks.dto';
import { EvaluationMarks } from './entities/evaluation-marks.entity';
import { SupervisorMarks } from './entities/supervisor-marks.entity';
import { EvaluationTally, tallyEvaluation } from './evaluation-completion';

export function validateScore(score: number): void {
  if (!Number.isFinite(score) || score < 0 || score > 100 || !hasAtMostTwoDecimals(score)) {
    throw new ValidationError('Score must be between 0 and 100 with at most two decimals', { score });
  }
}

interface Completion {
  tally: EvaluationTally;
  evaluated: boolean;
}

interface MarkWrite<T> extends Completion {
  marks: T;
  submission: DocumentSubmission;
}

@Injectable()
export class MarkingService {
  private readonly logger = new Logger(MarkingService.name);

  constructor(
    @InjectRepository(DocumentSubmission)
    private readonly submissionRepository: Repository<DocumentSubmission>,
    @InjectRepository(SupervisorMarks)
    private readonly supervisorMarksRepository: Repository<SupervisorMarks>,
    @InjectRepository(EvaluationMarks)
    private readonly evaluationMarksRepository: Repository<EvaluationMarks>,
    private readonly dataSource: DataSource,
    private readonly projectsService: ProjectsService,
    private readonly settingsService: SettingsService,
    private readonly resultsService: ResultsService,
    private readonly notificationService: NotificationService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  /** Creates or overwrites the supervisor's mark; only the latest one counts. */
  async submitSupervisorMarks(
    submissionId: string,
    score: number,
    supervisor: Actor,
    comments?: string,
  ): Promise<SupervisorMarks> {
    assertCapability(supervisor, Capability.SUBMIT_SUPERVISOR_MARKS);
    const submission = await this.findSubmission(submissionId);
    const project = await this.projectsService.findById(submission.projectId);
    if (!this.projectsService.isSupervisor(project, supervisor.id)) {
      throw new UnauthorizedActionError('Only the assigned supervisor may mark this submission', { submissionId });
    }
    this.assertLocked(submission);
    validateScore(score);
    const required = await this.settingsService.getRequiredEvaluatorCount();

    const write = await this.dataSource.transaction(async (manager): Promise<MarkWrite<SupervisorMarks>> => {
      const locked = await this.lockSubmission(manager, submissionId);
      const repository = manager.getRepository(SupervisorMarks);
      const existing = await repository.findOne({ where: { submissionId } });
      const marks = existing ?? repository.create({ submissionId });
      marks.supervisorId = supervisor.id;
      marks.score = score;
      marks.comments = comments?.trim() || null;
      const saved = await repository.save(marks);
      return { marks: saved, submission: locked, ...(await this.promoteIfComplete(manager, locked, required)) };
    });

    await this.systemLoggingService.record(
      supervisor,
      { action: 'SUPERVISOR_MARKS_SUBMITTED', details: { submissionId, score } },
      write.marks.id,
    );
    await this.afterWrite(write);
    return write.marks;
  }

  /**
   * Creates or updates the caller's own evaluation. `finalize` freezes it;
   * a frozen evaluation cannot be changed.
   */
  async submitEvaluationMarks(
    submissionId: string,
    score: number,
    finalize: boolean,
    evaluator: Actor,
    comments?: string,
    now: Date = new Date(),
  ): Promise<EvaluationMarks> {
    assertCapability(evaluator, Capability.SUBMIT_EVALUATION_MARKS);
    this.assertLocked(await this.findSubmission(submissionId));
    validateScore(score);
    const required = await this.settingsService.getRequiredEvaluatorCount();

    const write = await this.dataSource.transaction(async (manager): Promise<MarkWrite<EvaluationMarks>> => {
      const locked = await this.lockSubmission(manager, submissionId);
      const repository = manager.getRepository(EvaluationMarks);
      const existing = await repository.findOne({ where: { submissionId, evaluatorId: evaluator.id } });
      if (existing?.isFinal) {
        throw new InvalidStateError('This evaluation has been finalized and can no longer be changed', {
          submissionId,
          evaluatorId: evaluator.id,
          currentStatus: locked.status,
        });
      }
      const marks = existing ?? repository.create({ submissionId, evaluatorId: evaluator.id, isFinal: false, finalizedAt: null });
      marks.score = score;
      marks.comments = comments?.trim() || null;
      if (finalize) {
        marks.isFinal = true;
        marks.finalizedAt = now;
      }
      const saved = await repository.save(marks);
      return { marks: saved, submission: locked, ...(await this.promoteIfComplete(manager, locked, required)) };
    });

    await this.systemLoggingService.record(
      evaluator,
      { action: 'EVALUATION_MARKS_SUBMITTED', details: { submissionId, score, finalized: write.marks.isFinal } },
      write.marks.id,
    );
    if (finalize) {
      this.notificationService.dispatch({
        type: 'EvaluationFinalized',
        recipients: [toRole(Role.FYP_COMMITTEE)],
        submissionId,
        projectId: write.submission.projectId,
        evaluatorId: evaluator.id,
        score: write.marks.score,
        finalizedEvaluators: write.tally.finalizedEvaluators,
        requiredEvaluators: write.tally.requiredEvaluators,
      });
    }
    await this.afterWrite(write);
    return write.marks;
  }

  async getEvaluationSummary(submissionId: string, actor: Actor): Promise<EvaluationSummary> {
    assertCapability(actor, Capability.VIEW_EVALUATION_SUMMARY);
    const submission = await this.findSubmission(submissionId);
    if (actor.role === Role.SUPERVISOR) {
      const project = await this.projectsService.findById(submission.projectId);
      if (!this.projectsService.isSupervisor(project, actor.id)) {
        throw new UnauthorizedActionError('Supervisors may only view their own projects', { submissionId });
      }
    }

    const [supervisorMarks, evaluations, required] = await Promise.all([
      this.supervisorMarksRepository.findOne({ where: { submissionId } }),
      this.evaluationMarksRepository.find({ where: { submissionId }, order: { createdAt: 'ASC' } }),
      this.settingsService.getRequiredEvaluatorCount(),
    ]);
    const tally = tallyEvaluation(supervisorMarks, evaluations, required);

    return {
      submissionId,
      projectId: submission.projectId,
      status: submission.status,
      ...tally,
      supervisorScore: supervisorMarks?.score ?? null,
      evaluations: evaluations.map((e) => ({
        evaluatorId: e.evaluatorId,
        score: e.score,
        comments: e.comments,
        isFinal: e.isFinal,
        finalizedAt: e.finalizedAt,
      })),
    };
  }

  getMyEvaluation(submissionId: string, evaluator: Actor): Promise<EvaluationMarks | null> {
    assertCapability(evaluator, Capability.SUBMIT_EVALUATION_MARKS);
    return this.evaluationMarksRepository.findOne({ where: { submissionId, evaluatorId: evaluator.id } });
  }

  private async findSubmission(id: string): Promise<DocumentSubmission> {
    const submission = await this.submissionRepository.findOne({ where: { id } });
    if (!submission) throw new NotFoundError('DocumentSubmission', id);
    return submission;
  }

  private assertLocked(submission: DocumentSubmission): void {
    if (submission.status !== SubmissionStatus.LOCKED) {
      throw InvalidStateError.forSubmission(submission.id, submission.status, [SubmissionStatus.LOCKED]);
    }
  }

  /** Re-reads the submission under a row lock so mark writes on it serialize. */
  private async lockSubmission(manager: EntityManager, submissionId: string): Promise<DocumentSubmission> {
    const submission = await manager
      .getRepository(DocumentSubmission)
      .findOne({ where: { id: submissionId }, lock: { mode: 'pessimistic_write' } });
    if (!submission) throw new NotFoundError('DocumentSubmission', submissionId);
    this.assertLocked(submission);
    return submission;
  }

  private async promoteIfComplete(
    manager: EntityManager,
    submission: DocumentSubmission,
    requiredEvaluators: number,
  ): Promise<Completion> {
    const [supervisorMarks, evaluations] = await Promise.all([
      manager.getRepository(SupervisorMarks).findOne({ where: { submissionId: submission.id } }),
      manager.getRepository(EvaluationMarks).find({ where: { submissionId: submission.id } }),
    ]);
    const tally = tallyEvaluation(supervisorMarks, evaluations, requiredEvaluators);
    if (!tally.complete) return { tally, evaluated: false };

    assertTransition(submission.id, submission.status, SubmissionStatus.EVALUATED);
    const result = await manager
      .getRepository(DocumentSubmission)
      .update({ id: submission.id, status: SubmissionStatus.LOCKED }, { status: SubmissionStatus.EVALUATED });
    return { tally, evaluated: Boolean(result.affected) };
  }

  private async afterWrite<T>({ submission, evaluated }: MarkWrite<T>): Promise<void> {
    if (!evaluated) return;
    this.logger.log(`Submission ${submission.id} fully evaluated`);
    await this.systemLoggingService.record(
      SYSTEM_ACTOR,
      { action: 'SUBMISSION_EVALUATED', details: { projectId: submission.projectId } },
      submission.id,
    );
    try {
      await this.resultsService.computeIfReady(submission.projectId, SYSTEM_ACTOR);
    } catch (error) {
      this.logger.error(
        `Automatic result computation failed for project ${submission.projectId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
