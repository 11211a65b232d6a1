import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import {
  InvalidStateError,
  NotFoundError,
  UnauthorizedActionError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { assertCapability } from '../common/guards/capabilities';
import { Actor, SYSTEM_ACTOR } from '../common/types/actor';
import { Capability, Role, hasCapability } from '../common/types/permissions';
import { isPast } from '../deadlines/deadline-rules';
import { DeadlinesService } from '../deadlines/deadlines.service';
import { ProjectDeadline } from '../deadlines/entities/project-deadline.entity';
import { DocumentTypesService } from '../document-types/document-types.service';
import { DocumentType } from '../document-types/entities/document-type.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { NotificationService } from '../notifications/notification.service';
import { toRole, toUser } from '../notifications/notification-events';
import { Project } from '../projects/entities/project.entity';
import { ProjectsService } from '../projects/projects.service';
import { SettingsService } from '../settings/settings.service';
import { FileReference, PassedDeadlineReport, SubmissionView } from './dtos/submission.dto';
import { DocumentSubmission } from './entities/document-submission.entity';
import { SubmissionStatus, assertTransition, isAccepted, isUnderEvaluation } from './submission-status';

export interface CreateSubmissionOptions {
  comments?: string;
  draft?: boolean;
}

@Injectable()
export class SubmissionsService {
  private readonly logger = new Logger(SubmissionsService.name);

  constructor(
    @InjectRepository(DocumentSubmission)
    private readonly submissionRepository: Repository<DocumentSubmission>,
    private readonly dataSource: DataSource,
    private readonly documentTypesService: DocumentTypesService,
    private readonly deadlinesService: DeadlinesService,
    private readonly projectsService: ProjectsService,
    private readonly settingsService: SettingsService,
    private readonly notificationService: NotificationService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  /**
   * Uploads a new revision for a (project, document type) pair. A pair whose
   * current revision is final or already with the committee takes no more
   * uploads.
   */
  async createSubmission(
    projectId: string,
    documentTypeId: string,
    file: FileReference,
    uploader: Actor,
    options: CreateSubmissionOptions = {},
    now: Date = new Date(),
  ): Promise<DocumentSubmission> {
    assertCapability(uploader, Capability.SUBMIT_DOCUMENT);
    const project = await this.projectsService.findById(projectId);
    this.assertMember(project, uploader);

    const documentType = await this.documentTypesService.findById(documentTypeId);
    if (!documentType.isActive) {
      throw new ValidationError(`Document type ${documentType.code} is not accepting submissions`, {
        documentTypeId,
      });
    }
    if (!file.fileId.trim() || !file.fileUrl.trim()) {
      throw new ValidationError('A file reference is required');
    }
    if (await this.settingsService.isSequentialSubmissionEnforced()) {
      await this.assertEarlierDocumentsAccepted(project, documentType);
    }

    const deadline = await this.deadlinesService.deadlineFor(project.id, documentType.id);
    const isLate = deadline !== null && isPast(deadline.deadlineDate, now);
    const draft = options.draft === true;

    const saved = await this.dataSource.transaction(async (manager) => {
      const submissions = manager.getRepository(DocumentSubmission);
      const current = await submissions.findOne({
        where: { projectId: project.id, documentTypeId: documentType.id },
        order: { version: 'DESC' },
      });
      if (current && (current.isFinal || isUnderEvaluation(current.status))) {
        throw new InvalidStateError(`${documentType.code} already has a final submission for this project`, {
          submissionId: current.id,
          currentStatus: current.status,
          isFinal: current.isFinal,
        });
      }

      return submissions.save(
        submissions.create({
          projectId: project.id,
          documentTypeId: documentType.id,
          version: (current?.version ?? 0) + 1,
          supersedesId: current?.id ?? null,
          fileId: file.fileId,
          fileUrl: file.fileUrl,
          uploadedBy: uploader.id,
          status: draft ? SubmissionStatus.DRAFT : SubmissionStatus.PENDING_REVIEW,
          isFinal: false,
          finalizedAt: null,
          isLate,
          comments: options.comments?.trim() || null,
          reviewFeedback: null,
          reviewedBy: null,
          reviewedAt: null,
          lockedBy: null,
          lockedAt: null,
          uploadedAt: now,
        }),
      );
    });

    this.logger.log(
      `Submission ${saved.id} v${saved.version} of ${documentType.code} created for project ${project.id}${isLate ? ' (late)' : ''}`,
    );
    await this.systemLoggingService.record(
      uploader,
      {
        action: 'SUBMISSION_CREATED',
        details: { projectId: project.id, documentTypeId: documentType.id, version: saved.version, isLate, draft },
      },
      saved.id,
    );
    if (!draft) this.notifyUploaded(project, documentType, saved);
    return saved;
  }

  async submitDraft(submissionId: string, actor: Actor, now: Date = new Date()): Promise<DocumentSubmission> {
    assertCapability(actor, Capability.SUBMIT_DOCUMENT);
    const submission = await this.findById(submissionId);
    const project = await this.projectsService.findById(submission.projectId);
    this.assertMember(project, actor);
    await this.assertCurrent(submission);
    assertTransition(submission.id, submission.status, SubmissionStatus.PENDING_REVIEW);

    const documentType = await this.documentTypesService.findById(submission.documentTypeId);
    const deadline = await this.deadlinesService.deadlineFor(project.id, submission.documentTypeId);
    const isLate = deadline !== null && isPast(deadline.deadlineDate, now);
    const result = await this.submissionRepository.update(
      { id: submission.id, status: SubmissionStatus.DRAFT },
      { status: SubmissionStatus.PENDING_REVIEW, uploadedAt: now, isLate },
    );
    const updated = await this.requireUpdated(result.affected, submission.id, [SubmissionStatus.DRAFT]);

    await this.systemLoggingService.record(
      actor,
      { action: 'SUBMISSION_SUBMITTED', details: { projectId: project.id } },
      submission.id,
    );
    this.notifyUploaded(project, documentType, updated);
    return updated;
  }

  async review(
    submissionId: string,
    approve: boolean,
    feedback: string | undefined,
    supervisor: Actor,
    now: Date = new Date(),
  ): Promise<DocumentSubmission> {
    assertCapability(supervisor, Capability.REVIEW_SUBMISSION);
    const submission = await this.findById(submissionId);
    const project = await this.projectsService.findById(submission.projectId);
    if (!this.projectsService.isSupervisor(project, supervisor.id)) {
      throw new UnauthorizedActionError('Only the assigned supervisor may review this submission', {
        submissionId,
        projectId: project.id,
      });
    }

    const target = approve ? SubmissionStatus.APPROVED : SubmissionStatus.REVISION_REQUESTED;
    await this.assertCurrent(submission);
    assertTransition(submission.id, submission.status, target);

    const trimmed = feedback?.trim() ?? '';
    if (!approve && trimmed.length === 0) {
      throw new ValidationError('Feedback is required when requesting a revision', { submissionId });
    }

    const documentType = await this.documentTypesService.findById(submission.documentTypeId);
    if (!approve) {
      const deadline = await this.deadlinesService.deadlineFor(project.id, submission.documentTypeId);
      if (deadline !== null && isPast(deadline.deadlineDate, now)) {
        throw InvalidStateError.forSubmission(
          submission.id,
          submission.status,
          [SubmissionStatus.PENDING_REVIEW],
          `The ${documentType.title} deadline has passed; submission ${submission.id} can only be approved`,
        );
      }
    }

    const result = await this.submissionRepository.update(
      { id: submission.id, status: SubmissionStatus.PENDING_REVIEW },
      { status: target, reviewFeedback: trimmed || null, reviewedBy: supervisor.id, reviewedAt: now },
    );
    const updated = await this.requireUpdated(result.affected, submission.id, [SubmissionStatus.PENDING_REVIEW]);

    await this.systemLoggingService.record(
      supervisor,
      { action: 'SUBMISSION_REVIEWED', details: { projectId: project.id, approved: approve } },
      submission.id,
    );
    this.notificationService.dispatch({
      type: 'SubmissionReviewed',
      recipients: this.projectsService.studentIds(project).map(toUser),
      submissionId: submission.id,
      projectId: project.id,
      documentTypeTitle: documentType.title,
      approved: approve,
      feedback: updated.reviewFeedback,
    });
    return updated;
  }

  /** Group leader marks the approved revision as the final version. Cannot be undone. */
  async markFinal(submissionId: string, actor: Actor, now: Date = new Date()): Promise<DocumentSubmission> {
    assertCapability(actor, Capability.MARK_FINAL);
    const submission = await this.findById(submissionId);
    const project = await this.projectsService.findById(submission.projectId);
    if (!this.projectsService.isLeader(project, actor.id)) {
      throw new UnauthorizedActionError('Only the group leader may mark a submission final', {
        submissionId,
        projectId: project.id,
      });
    }
    await this.assertCurrent(submission);

    const updated = await this.finalize(submission, now);
    await this.systemLoggingService.record(
      actor,
      { action: 'SUBMISSION_MARKED_FINAL', details: { projectId: project.id } },
      submission.id,
    );
    return updated;
  }

  /**
   * Hands a final, approved submission to the evaluation committee. Of two
   * concurrent callers exactly one succeeds.
   */
  async lock(submissionId: string, actor: Actor, now: Date = new Date()): Promise<DocumentSubmission> {
    const submission = await this.findById(submissionId);
    if (submission.status !== SubmissionStatus.APPROVED) {
      throw InvalidStateError.forSubmission(submission.id, submission.status, [SubmissionStatus.APPROVED]);
    }
    if (!submission.isFinal) {
      throw InvalidStateError.forSubmission(
        submission.id,
        submission.status,
        [SubmissionStatus.APPROVED],
        `Submission ${submission.id} must be marked final before it can be locked`,
      );
    }
    assertCapability(actor, Capability.LOCK_SUBMISSION);
    assertTransition(submission.id, submission.status, SubmissionStatus.LOCKED);
    const [project, documentType] = await Promise.all([
      this.projectsService.findById(submission.projectId),
      this.documentTypesService.findById(submission.documentTypeId),
    ]);

    const result = await this.submissionRepository.update(
      { id: submission.id, status: SubmissionStatus.APPROVED, isFinal: true },
      { status: SubmissionStatus.LOCKED, lockedBy: actor.id, lockedAt: now },
    );
    const updated = await this.requireUpdated(result.affected, submission.id, [SubmissionStatus.APPROVED]);

    const automatic = actor.role === Role.SYSTEM;
    this.logger.log(`Submission ${submission.id} locked by ${actor.role}:${actor.id}`);
    await this.systemLoggingService.record(
      actor,
      { action: 'SUBMISSION_LOCKED', details: { projectId: submission.projectId, automatic } },
      submission.id,
    );
    this.notificationService.dispatch({
      type: 'SubmissionLocked',
      recipients: [...this.projectsService.studentIds(project).map(toUser), toRole(Role.EVALUATION_COMMITTEE)],
      submissionId: submission.id,
      projectId: project.id,
      documentTypeTitle: documentType.title,
      automatic,
    });
    return updated;
  }

  /**
   * Deadline pass: an approved current revision is finalized and locked by the
   * system; a project without one is reported. Each deadline is handled once.
   */
  async processPassedDeadlines(now: Date = new Date()): Promise<PassedDeadlineReport> {
    const due = await this.deadlinesService.findUnprocessedPassedDeadlines(now);
    const report: PassedDeadlineReport = { processedDeadlines: 0, locked: 0, notified: 0 };

    for (const { deadline, documentType, projects } of due) {
      for (const project of projects) {
        const outcome = await this.closeDeadlineForProject(project, documentType, deadline, now);
        if (outcome === 'locked') report.locked += 1;
        if (outcome === 'notified') report.notified += 1;
      }
      await this.deadlinesService.markPassedProcessed(deadline.id, now);
      report.processedDeadlines += 1;
    }

    if (report.processedDeadlines > 0) {
      this.logger.log(
        `Processed ${report.processedDeadlines} passed deadline(s): ${report.locked} locked, ${report.notified} notified`,
      );
    }
    return report;
  }

  async findById(id: string): Promise<DocumentSubmission> {
    const submission = await this.submissionRepository.findOne({ where: { id } });
    if (!submission) throw new NotFoundError('DocumentSubmission', id);
    return submission;
  }

  async getSubmission(id: string, actor: Actor): Promise<SubmissionView> {
    const submission = await this.findById(id);
    await this.assertCanView(submission.projectId, actor);
    const [current] = await this.historyOf(submission.projectId, submission.documentTypeId);
    return this.toDto(submission, current?.version ?? submission.version);
  }

  /** Every revision of the project's documents, newest first. */
  async listForProject(projectId: string, actor: Actor): Promise<SubmissionView[]> {
    await this.assertCanView(projectId, actor);
    const submissions = await this.submissionRepository.find({ where: { projectId } });
    const latest = new Map<string, number>();
    for (const s of submissions) {
      latest.set(s.documentTypeId, Math.max(latest.get(s.documentTypeId) ?? 0, s.version));
    }

    const sorted = submissions.sort(
      (a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime() || b.version - a.version,
    );
    return Promise.all(sorted.map((s) => this.toDto(s, latest.get(s.documentTypeId) ?? s.version)));
  }

  async listAwaitingEvaluation(actor: Actor): Promise<SubmissionView[]> {
    if (!hasCapability(actor.role, Capability.SUBMIT_EVALUATION_MARKS)) {
      assertCapability(actor, Capability.VIEW_EVALUATION_SUMMARY);
    }
    const locked = await this.submissionRepository.find({
      where: { status: SubmissionStatus.LOCKED },
      order: { lockedAt: 'ASC' },
    });
    return Promise.all(locked.map((s) => this.toDto(s, s.version)));
  }

  /** The highest version for the pair, or null when nothing was uploaded. */
  currentFor(projectId: string, documentTypeId: string): Promise<DocumentSubmission | null> {
    return this.submissionRepository.findOne({
      where: { projectId, documentTypeId },
      order: { version: 'DESC' },
    });
  }

  async toDto(submission: DocumentSubmission, currentVersion: number, now: Date = new Date()): Promise<SubmissionView> {
    const [documentType, deadline] = await Promise.all([
      this.documentTypesService.findById(submission.documentTypeId),
      this.deadlinesService.deadlineFor(submission.projectId, submission.documentTypeId),
    ]);
    return {
      id: submission.id,
      projectId: submission.projectId,
      documentTypeId: submission.documentTypeId,
      documentTypeCode: documentType.code,
      documentTypeTitle: documentType.title,
      version: submission.version,
      supersedesId: submission.supersedesId,
      isCurrent: submission.version === currentVersion,
      status: submission.status,
      fileId: submission.fileId,
      fileUrl: submission.fileUrl,
      uploadedBy: submission.uploadedBy,
      uploadedAt: submission.uploadedAt,
      comments: submission.comments,
      reviewFeedback: submission.reviewFeedback,
      reviewedBy: submission.reviewedBy,
      reviewedAt: submission.reviewedAt,
      isFinal: submission.isFinal,
      finalizedAt: submission.finalizedAt,
      lockedBy: submission.lockedBy,
      lockedAt: submission.lockedAt,
      isLate: submission.isLate,
      deadlineDate: deadline?.deadlineDate ?? null,
      deadlinePassed: deadline !== null && isPast(deadline.deadlineDate, now),
    };
  }

  private async closeDeadlineForProject(
    project: Project,
    documentType: DocumentType,
    deadline: ProjectDeadline,
    now: Date,
  ): Promise<'locked' | 'notified' | 'skipped'> {
    const current = await this.currentFor(project.id, documentType.id);
    if (current && isUnderEvaluation(current.status)) return 'skipped';

    if (current?.status === SubmissionStatus.APPROVED) {
      try {
        const finalized = current.isFinal ? current : await this.finalize(current, now);
        await this.lock(finalized.id, SYSTEM_ACTOR, now);
        return 'locked';
      } catch (error) {
        // Someone else moved it first; the next read sees the new status.
        if (!(error instanceof InvalidStateError)) throw error;
        this.logger.warn(`Could not auto-lock submission ${current.id}: ${error.message}`);
        return 'skipped';
      }
    }

    this.notificationService.dispatch({
      type: 'DeadlinePassed',
      recipients: [...this.deadlinesService.projectRecipients(project), ...this.deadlinesService.committeeRecipients()],
      projectId: project.id,
      documentTypeTitle: documentType.title,
      deadlineDate: deadline.deadlineDate,
    });
    return 'notified';
  }

  private async finalize(submission: DocumentSubmission, now: Date): Promise<DocumentSubmission> {
    if (submission.status !== SubmissionStatus.APPROVED) {
      throw InvalidStateError.forSubmission(submission.id, submission.status, [SubmissionStatus.APPROVED]);
    }
    if (submission.isFinal) {
      throw new InvalidStateError(`Submission ${submission.id} is already final`, {
        submissionId: submission.id,
        currentStatus: submission.status,
        isFinal: true,
      });
    }
    const result = await this.submissionRepository.update(
      { id: submission.id, status: SubmissionStatus.APPROVED, isFinal: false },
      { isFinal: true, finalizedAt: now },
    );
    return this.requireUpdated(result.affected, submission.id, [SubmissionStatus.APPROVED]);
  }

  private notifyUploaded(project: Project, documentType: DocumentType, submission: DocumentSubmission): void {
    if (!project.supervisorId) return;
    this.notificationService.dispatch({
      type: 'SubmissionUploaded',
      recipients: [toUser(project.supervisorId)],
      submissionId: submission.id,
      projectId: project.id,
      documentTypeTitle: documentType.title,
      version: submission.version,
      isLate: submission.isLate,
    });
  }

  private async assertEarlierDocumentsAccepted(project: Project, documentType: DocumentType): Promise<void> {
    const required = await this.documentTypesService.requiredForProject(project);
    const earlier = required.filter((t) => t.displayOrder < documentType.displayOrder);
    for (const previous of earlier) {
      const current = await this.currentFor(project.id, previous.id);
      if (!current || !isAccepted(current.status)) {
        throw new ValidationError(`${previous.code} must be approved before ${documentType.code} can be submitted`, {
          required: previous.code,
          documentType: documentType.code,
        });
      }
    }
  }

  private async assertCurrent(submission: DocumentSubmission): Promise<void> {
    const current = await this.currentFor(submission.projectId, submission.documentTypeId);
    if (current && current.id !== submission.id) {
      throw new InvalidStateError(
        `Submission ${submission.id} has been superseded by version ${current.version}`,
        { submissionId: submission.id, currentStatus: submission.status, supersededBy: current.id },
      );
    }
  }

  private assertMember(project: Project, actor: Actor): void {
    if (!this.projectsService.isMember(project, actor.id)) {
      throw new UnauthorizedActionError('Only members of the project group may do this', {
        projectId: project.id,
      });
    }
  }

  private async assertCanView(projectId: string, actor: Actor): Promise<void> {
    assertCapability(actor, Capability.VIEW_SUBMISSIONS);
    const project = await this.projectsService.findById(projectId);
    if (actor.role === Role.STUDENT) this.assertMember(project, actor);
    if (actor.role === Role.SUPERVISOR && !this.projectsService.isSupervisor(project, actor.id)) {
      throw new UnauthorizedActionError('Supervisors may only view their own projects', { projectId });
    }
  }

  private historyOf(projectId: string, documentTypeId: string): Promise<DocumentSubmission[]> {
    return this.submissionRepository.find({ where: { projectId, documentTypeId }, order: { version: 'DESC' } });
  }

  /** Reloads after a conditional update; zero affected rows means another caller won. */
  private async requireUpdated(
    affected: number | undefined,
    submissionId: string,
    requiredStatus: SubmissionStatus[],
  ): Promise<DocumentSubmission> {
    const reloaded = await this.findById(submissionId);
    if (!affected) {
      throw InvalidStateError.forSubmission(submissionId, reloaded.status, requiredStatus);
    }
    return reloaded;
  }
}
