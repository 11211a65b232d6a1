import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { NotFoundError, ValidationError } from '../common/exceptions/domain.exceptions';
import { assertCapability } from '../common/guards/capabilities';
import { Actor } from '../common/types/actor';
import { Capability, Role } from '../common/types/permissions';
import { DocumentType } from '../document-types/entities/document-type.entity';
import { DocumentTypesService } from '../document-types/document-types.service';
import { SystemLoggingService } from '../logs/system-logging.service';
import { NotificationService } from '../notifications/notification.service';
import { Recipient, toRole, toUser } from '../notifications/notification-events';
import { Project } from '../projects/entities/project.entity';
import { ProjectsService } from '../projects/projects.service';
import { SettingsService } from '../settings/settings.service';
import { CreateDeadlineBatchDto, DeadlineEntryDto, ProjectDeadlineView } from './dtos/deadline.dto';
import { DeadlineBatch } from './entities/deadline-batch.entity';
import { ProjectDeadline } from './entities/project-deadline.entity';
import { ScheduledDeadline, isApproaching, isPast, validateDeadlineSchedule } from './deadline-rules';

/** A deadline of an active batch together with what the jobs need to act on it. */
export interface ActiveDeadline {
  deadline: ProjectDeadline;
  documentType: DocumentType;
  projects: Project[];
}

@Injectable()
export class DeadlinesService {
  private readonly logger = new Logger(DeadlinesService.name);

  constructor(
    @InjectRepository(DeadlineBatch)
    private readonly batchRepository: Repository<DeadlineBatch>,
    @InjectRepository(ProjectDeadline)
    private readonly deadlineRepository: Repository<ProjectDeadline>,
    private readonly dataSource: DataSource,
    private readonly documentTypesService: DocumentTypesService,
    private readonly projectsService: ProjectsService,
    private readonly settingsService: SettingsService,
    private readonly notificationService: NotificationService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  async createBatch(dto: CreateDeadlineBatchDto, actor: Actor): Promise<DeadlineBatch> {
    assertCapability(actor, Capability.MANAGE_DEADLINES);
    if (await this.batchRepository.findOne({ where: { name: dto.name } })) {
      throw new ValidationError(`Deadline batch ${dto.name} already exists`, { name: dto.name });
    }
    if (dto.appliesFrom && dto.appliesUntil && dto.appliesUntil.getTime() <= dto.appliesFrom.getTime()) {
      throw new ValidationError('appliesUntil must be after appliesFrom');
    }
    const schedule = dto.deadlines?.length ? await this.buildSchedule(dto.deadlines) : [];

    const batchId = await this.dataSource.transaction(async (manager) => {
      const batches = manager.getRepository(DeadlineBatch);
      const batch = await batches.save(
        batches.create({
          name: dto.name,
          description: dto.description ?? null,
          appliesFrom: dto.appliesFrom ?? null,
          appliesUntil: dto.appliesUntil ?? null,
          isActive: true,
          createdBy: actor.id,
        }),
      );
      await this.insertSchedule(manager.getRepository(ProjectDeadline), batch.id, schedule);
      return batch.id;
    });

    this.logger.log(`Deadline batch "${dto.name}" created with ${schedule.length} deadline(s)`);
    await this.systemLoggingService.record(
      actor,
      { action: 'DEADLINE_BATCH_CREATED', details: { name: dto.name, deadlineCount: schedule.length } },
      batchId,
    );
    return this.getBatch(batchId);
  }

  /** Replaces every deadline of the batch in one transaction. */
  async setDeadlines(batchId: string, entries: DeadlineEntryDto[], actor: Actor): Promise<ProjectDeadline[]> {
    assertCapability(actor, Capability.MANAGE_DEADLINES);
    await this.findBatch(batchId);
    const schedule = await this.buildSchedule(entries);

    await this.dataSource.transaction(async (manager) => {
      const deadlines = manager.getRepository(ProjectDeadline);
      await deadlines.delete({ batchId });
      await this.insertSchedule(deadlines, batchId, schedule);
    });

    await this.systemLoggingService.record(
      actor,
      { action: 'DEADLINES_SET', details: { deadlineCount: schedule.length } },
      batchId,
    );
    return this.deadlinesOf(batchId);
  }

  async getBatch(id: string): Promise<DeadlineBatch> {
    const batch = await this.findBatch(id);
    batch.deadlines = await this.deadlinesOf(id);
    return batch;
  }

  listBatches(): Promise<DeadlineBatch[]> {
    return this.batchRepository.find({ order: { createdAt: 'DESC' } });
  }

  async deactivateBatch(id: string, actor: Actor): Promise<DeadlineBatch> {
    assertCapability(actor, Capability.MANAGE_DEADLINES);
    const batch = await this.findBatch(id);
    if (!batch.isActive) return batch;

    batch.isActive = false;
    const saved = await this.batchRepository.save(batch);
    await this.systemLoggingService.record(actor, { action: 'DEADLINE_BATCH_DEACTIVATED', details: { name: batch.name } }, id);
    return saved;
  }

  async getProjectDeadlines(projectId: string, now: Date = new Date()): Promise<ProjectDeadlineView[]> {
    const project = await this.projectsService.findById(projectId);
    if (!project.deadlineBatchId) return [];

    const [deadlines, types] = await Promise.all([
      this.deadlinesOf(project.deadlineBatchId),
      this.documentTypesService.findAll(),
    ]);
    const typesById = new Map(types.map((t) => [t.id, t]));
    return deadlines.map((deadline) => ({
      id: deadline.id,
      documentTypeId: deadline.documentTypeId,
      documentTypeCode: typesById.get(deadline.documentTypeId)?.code ?? '',
      documentTypeTitle: typesById.get(deadline.documentTypeId)?.title ?? '',
      deadlineDate: deadline.deadlineDate,
      sortOrder: deadline.sortOrder,
      isPast: isPast(deadline.deadlineDate, now),
    }));
  }

  async deadlineFor(projectId: string, documentTypeId: string): Promise<ProjectDeadline | null> {
    const project = await this.projectsService.findById(projectId);
    if (!project.deadlineBatchId) return null;
    return this.deadlineRepository.findOne({ where: { batchId: project.deadlineBatchId, documentTypeId } });
  }

  /**
   * Notifies every project of an active batch about deadlines falling inside
   * the reminder window. Each deadline is reminded once.
   */
  async sendDeadlineReminders(now: Date = new Date()): Promise<number> {
    const windowHours = await this.settingsService.getReminderWindowHours();
    const due = (await this.activeDeadlines()).filter(
      ({ deadline }) => deadline.reminderSentAt === null && isApproaching(deadline.deadlineDate, windowHours, now),
    );

    for (const { deadline, documentType, projects } of due) {
      for (const project of projects) {
        this.notificationService.dispatch({
          type: 'DeadlineApproaching',
          recipients: this.projectRecipients(project),
          projectId: project.id,
          documentTypeTitle: documentType.title,
          deadlineDate: deadline.deadlineDate,
        });
      }
      await this.deadlineRepository.update({ id: deadline.id }, { reminderSentAt: now });
    }

    if (due.length > 0) this.logger.log(`Sent reminders for ${due.length} approaching deadline(s)`);
    return due.length;
  }

  /** Passed deadlines of active batches that the passed-deadline pass has not handled yet. */
  async findUnprocessedPassedDeadlines(now: Date): Promise<ActiveDeadline[]> {
    return (await this.activeDeadlines()).filter(
      ({ deadline }) => deadline.passedProcessedAt === null && isPast(deadline.deadlineDate, now),
    );
  }

  async markPassedProcessed(deadlineId: string, now: Date): Promise<void> {
    await this.deadlineRepository.update({ id: deadlineId }, { passedProcessedAt: now });
  }

  projectRecipients(project: Project): Recipient[] {
    const recipients = this.projectsService.studentIds(project).map(toUser);
    if (project.supervisorId) recipients.push(toUser(project.supervisorId));
    return recipients;
  }

  committeeRecipients(): Recipient[] {
    return [toRole(Role.FYP_COMMITTEE)];
  }

  private async activeDeadlines(): Promise<ActiveDeadline[]> {
    const batches = await this.batchRepository.find({ where: { isActive: true } });
    if (batches.length === 0) return [];
    const typesById = new Map((await this.documentTypesService.findAll()).map((t) => [t.id, t]));

    const result: ActiveDeadline[] = [];
    for (const batch of batches) {
      const [deadlines, projects] = await Promise.all([
        this.deadlinesOf(batch.id),
        this.projectsService.findByDeadlineBatch(batch.id),
      ]);
      for (const deadline of deadlines) {
        const documentType = typesById.get(deadline.documentTypeId);
        if (documentType) result.push({ deadline, documentType, projects });
      }
    }
    return result;
  }

  private async findBatch(id: string): Promise<DeadlineBatch> {
    const batch = await this.batchRepository.findOne({ where: { id } });
    if (!batch) throw new NotFoundError('DeadlineBatch', id);
    return batch;
  }

  private deadlinesOf(batchId: string): Promise<ProjectDeadline[]> {
    return this.deadlineRepository.find({ where: { batchId }, order: { sortOrder: 'ASC' } });
  }

  private async buildSchedule(entries: DeadlineEntryDto[]): Promise<ScheduledDeadline[]> {
    const typesById = new Map((await this.documentTypesService.findAll()).map((t) => [t.id, t]));
    const seen = new Set<string>();

    const schedule = entries.map((entry) => {
      const documentType = typesById.get(entry.documentTypeId);
      if (!documentType) {
        throw new ValidationError(`Unknown document type ${entry.documentTypeId}`, { documentTypeId: entry.documentTypeId });
      }
      if (seen.has(documentType.id)) {
        throw new ValidationError(`Document type ${documentType.code} appears more than once`, { code: documentType.code });
      }
      seen.add(documentType.id);
      return {
        documentTypeId: documentType.id,
        code: documentType.code,
        displayOrder: documentType.displayOrder,
        deadlineDate: entry.deadlineDate,
      };
    });

    return validateDeadlineSchedule(schedule, await this.settingsService.getMinDeadlineGapDays());
  }

  private async insertSchedule(
    repository: Repository<ProjectDeadline>,
    batchId: string,
    schedule: ScheduledDeadline[],
  ): Promise<void> {
    if (schedule.length === 0) return;
    await repository.save(
      schedule.map((entry) =>
        repository.create({
          batchId,
          documentTypeId: entry.documentTypeId,
          deadlineDate: entry.deadlineDate,
          sortOrder: entry.sortOrder,
          reminderSentAt: null,
          passedProcessedAt: null,
        }),
      ),
    );
  }
}
