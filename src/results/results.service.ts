import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { NotFoundError, UnauthorizedActionError, ValidationError } from '../common/exceptions/domain.exceptions';
import { assertCapability } from '../common/guards/capabilities';
import { Actor } from '../common/types/actor';
import { Capability, Role } from '../common/types/permissions';
import { DocumentTypesService } from '../document-types/document-types.service';
import { DocumentType } from '../document-types/entities/document-type.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { EvaluationMarks } from '../marking/entities/evaluation-marks.entity';
import { SupervisorMarks } from '../marking/entities/supervisor-marks.entity';
import { tallyEvaluation } from '../marking/evaluation-completion';
import { NotificationService } from '../notifications/notification.service';
import { toUser } from '../notifications/notification-events';
import { Project } from '../projects/entities/project.entity';
import { ProjectsService } from '../projects/projects.service';
import { SettingsService } from '../settings/settings.service';
import { DocumentSubmission } from '../submissions/entities/document-submission.entity';
import { SubmissionStatus } from '../submissions/submission-status';
import { ComputeOutcome, PendingDocument } from './dtos/result.dto';
import { FinalResult } from './entities/final-result.entity';
import { DocumentScoreInput, calculateResult } from './result-calculator';

@Injectable()
export class ResultsService {
  private readonly logger = new Logger(ResultsService.name);

  constructor(
    @InjectRepository(FinalResult)
    private readonly resultRepository: Repository<FinalResult>,
    private readonly dataSource: DataSource,
    private readonly documentTypesService: DocumentTypesService,
    private readonly projectsService: ProjectsService,
    private readonly settingsService: SettingsService,
    private readonly notificationService: NotificationService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  /**
   * Computes and stores the project's final result once every required
   * document is EVALUATED; otherwise reports what is still pending.
   * Recomputing writes only the computed columns, never the release state.
   */
  async computeIfReady(projectId: string, actor: Actor, now: Date = new Date()): Promise<ComputeOutcome> {
    assertCapability(actor, Capability.COMPUTE_RESULT);
    const project = await this.projectsService.findById(projectId);
    const required = await this.documentTypesService.requiredForProject(project);
    if (required.length === 0) {
      throw new ValidationError('No document types are configured for this project', { projectId });
    }

    const requiredEvaluators = await this.settingsService.getRequiredEvaluatorCount();

    const outcome = await this.dataSource.transaction(async (manager): Promise<ComputeOutcome> => {
      // Serializes computations and releases for the same project.
      await this.lockProject(manager, project.id);

      const { inputs, pending } = await this.collectScores(manager, project.id, required, requiredEvaluators);
      if (pending.length > 0) {
        return { status: 'NOT_READY', projectId: project.id, pending };
      }

      const { totalScore, breakdown } = calculateResult(inputs);
      const computed = { totalScore, breakdown, computedBy: actor.id, computedAt: now };
      const results = manager.getRepository(FinalResult);
      const existing = await results.findOne({ where: { projectId: project.id } });
      if (!existing) {
        const created = results.create({ projectId: project.id, released: false, releasedAt: null, releasedBy: null, ...computed });
        return { status: 'COMPUTED', result: await results.save(created) };
      }

      await results.update({ id: existing.id }, computed);
      const updated = await results.findOne({ where: { id: existing.id } });
      if (!updated) throw new NotFoundError('FinalResult', project.id);
      return { status: 'COMPUTED', result: updated };
    });

    if (outcome.status === 'NOT_READY') {
      this.logger.debug(`Result for project ${project.id} not ready: ${outcome.pending.length} document(s) pending`);
      return outcome;
    }

    this.logger.log(`Final result for project ${project.id} computed: ${outcome.result.totalScore.toFixed(2)}`);
    await this.systemLoggingService.record(
      actor,
      { action: 'RESULT_COMPUTED', details: { totalScore: outcome.result.totalScore, documentCount: outcome.result.breakdown.length } },
      outcome.result.id,
    );
    return outcome;
  }

  /** Makes the result visible to students. Releasing again keeps the first release time. */
  async release(projectId: string, actor: Actor, now: Date = new Date()): Promise<FinalResult> {
    assertCapability(actor, Capability.RELEASE_RESULT);
    const project = await this.projectsService.findById(projectId);

    const { result: released, changed } = await this.dataSource.transaction(async (manager) => {
      await this.lockProject(manager, project.id);
      const results = manager.getRepository(FinalResult);
      const result = await results.findOne({ where: { projectId } });
      if (!result) throw new NotFoundError('FinalResult', projectId);
      if (result.released) return { result, changed: false };

      const update = await results.update(
        { id: result.id, released: false },
        { released: true, releasedAt: now, releasedBy: actor.id },
      );
      const reloaded = await results.findOne({ where: { id: result.id } });
      if (!reloaded) throw new NotFoundError('FinalResult', projectId);
      return { result: reloaded, changed: Boolean(update.affected) };
    });
    if (!changed) return released;

    this.logger.log(`Final result for project ${projectId} released by ${actor.id}`);
    await this.systemLoggingService.record(
      actor,
      { action: 'RESULT_RELEASED', details: { totalScore: released.totalScore } },
      released.id,
    );
    this.notificationService.dispatch({
      type: 'ResultReleased',
      recipients: this.projectsService.studentIds(project).map(toUser),
      projectId,
      totalScore: released.totalScore,
    });
    return released;
  }

  /** Student view: only a released result exists as far as the caller can tell. */
  async getReleased(projectId: string, actor: Actor): Promise<FinalResult> {
    assertCapability(actor, Capability.VIEW_RELEASED_RESULT);
    if (actor.role === Role.STUDENT) {
      const project = await this.projectsService.findById(projectId);
      if (!this.projectsService.isMember(project, actor.id)) {
        throw new UnauthorizedActionError('Students may only view their own project result', { projectId });
      }
    }
    const result = await this.resultRepository.findOne({ where: { projectId } });
    if (!result || !result.released) throw new NotFoundError('FinalResult', projectId);
    return result;
  }

  async getResult(projectId: string, actor: Actor): Promise<FinalResult> {
    assertCapability(actor, Capability.VIEW_RESULT);
    return this.findResult(projectId);
  }

  private async findResult(projectId: string): Promise<FinalResult> {
    const result = await this.resultRepository.findOne({ where: { projectId } });
    if (!result) throw new NotFoundError('FinalResult', projectId);
    return result;
  }

  private async lockProject(manager: EntityManager, projectId: string): Promise<void> {
    await manager.getRepository(Project).findOne({ where: { id: projectId }, lock: { mode: 'pessimistic_write' } });
  }

  private async collectScores(
    manager: EntityManager,
    projectId: string,
    required: DocumentType[],
    requiredEvaluators: number,
  ): Promise<{ inputs: DocumentScoreInput[]; pending: PendingDocument[] }> {
    const submissions = manager.getRepository(DocumentSubmission);
    const supervisorMarks = manager.getRepository(SupervisorMarks);
    const evaluationMarks = manager.getRepository(EvaluationMarks);
    const inputs: DocumentScoreInput[] = [];
    const pending: PendingDocument[] = [];

    for (const documentType of required) {
      const current = await submissions.findOne({
        where: { projectId, documentTypeId: documentType.id },
        order: { version: 'DESC' },
      });
      const base = {
        documentTypeId: documentType.id,
        docTypeCode: documentType.code,
        submissionId: current?.id ?? null,
        status: current?.status ?? null,
      };
      if (!current) {
        pending.push({ ...base, reason: 'NO_SUBMISSION' });
        continue;
      }
      if (current.status === SubmissionStatus.LOCKED) {
        pending.push({ ...base, reason: 'EVALUATION_INCOMPLETE' });
        continue;
      }
      if (current.status !== SubmissionStatus.EVALUATED) {
        pending.push({ ...base, reason: 'NOT_LOCKED' });
        continue;
      }

      // The stored status can lag a raised evaluator requirement, so the marks are re-checked.
      const supervisor = await supervisorMarks.findOne({ where: { submissionId: current.id } });
      const evaluations = await evaluationMarks.find({ where: { submissionId: current.id } });
      const tally = tallyEvaluation(supervisor, evaluations, requiredEvaluators);
      if (!supervisor || !tally.complete || tally.averageScore === null) {
        this.logger.warn(
          `Submission ${current.id} is EVALUATED but has ${tally.finalizedEvaluators} of ${requiredEvaluators} finalized evaluations`,
        );
        pending.push({ ...base, reason: 'EVALUATION_INCOMPLETE' });
        continue;
      }

      inputs.push({
        documentTypeId: documentType.id,
        docTypeCode: documentType.code,
        docTypeTitle: documentType.title,
        submissionId: current.id,
        supervisorScore: supervisor.score,
        supervisorWeight: documentType.supervisorWeight,
        committeeAvgScore: tally.averageScore,
        committeeWeight: documentType.committeeWeight,
        evaluatorCount: tally.finalizedEvaluators,
      });
    }
    return { inputs, pending };
  }
}
