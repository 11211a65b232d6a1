import { ConfigService } from '../../src/config/config.service';
import { Actor } from '../../src/common/types/actor';
import { Role } from '../../src/common/types/permissions';
import { DeadlineBatch } from '../../src/deadlines/entities/deadline-batch.entity';
import { ProjectDeadline } from '../../src/deadlines/entities/project-deadline.entity';
import { DeadlinesService } from '../../src/deadlines/deadlines.service';
import { DocumentType } from '../../src/document-types/entities/document-type.entity';
import { DocumentTypesService } from '../../src/document-types/document-types.service';
import { Log } from '../../src/logs/logs.entity';
import { SystemLoggingService } from '../../src/logs/system-logging.service';
import { EvaluationMarks } from '../../src/marking/entities/evaluation-marks.entity';
import { SupervisorMarks } from '../../src/marking/entities/supervisor-marks.entity';
import { MarkingService } from '../../src/marking/marking.service';
import { Notification } from '../../src/notifications/entities/notification.entity';
import { NotificationService } from '../../src/notifications/notification.service';
import { Project } from '../../src/projects/entities/project.entity';
import { ProjectsService } from '../../src/projects/projects.service';
import { FinalResult } from '../../src/results/entities/final-result.entity';
import { ResultsService } from '../../src/results/results.service';
import { SystemSetting } from '../../src/settings/entities/system-setting.entity';
import { SettingsService } from '../../src/settings/settings.service';
import { DocumentSubmission } from '../../src/submissions/entities/document-submission.entity';
import { SubmissionsService } from '../../src/submissions/submissions.service';
import { InMemoryDataSource } from './in-memory-data-source';

export const actors = {
  leader: { id: 'student-1', role: Role.STUDENT, name: 'Group Leader' },
  member: { id: 'student-2', role: Role.STUDENT, name: 'Group Member' },
  outsider: { id: 'student-9', role: Role.STUDENT, name: 'Other Student' },
  supervisor: { id: 'supervisor-1', role: Role.SUPERVISOR, name: 'Supervisor' },
  otherSupervisor: { id: 'supervisor-2', role: Role.SUPERVISOR, name: 'Other Supervisor' },
  evaluator: { id: 'evaluator-1', role: Role.EVALUATION_COMMITTEE, name: 'Evaluator One' },
  evaluator2: { id: 'evaluator-2', role: Role.EVALUATION_COMMITTEE, name: 'Evaluator Two' },
  fypCommittee: { id: 'fyp-1', role: Role.FYP_COMMITTEE, name: 'FYP Committee' },
  admin: { id: 'admin-1', role: Role.ADMIN, name: 'Admin' },
} satisfies Record<string, Actor>;

export const FILE = { fileId: 'files/test-1', fileUrl: 'https://files.test/test-1' };

export interface TestContext {
  dataSource: InMemoryDataSource;
  settings: SettingsService;
  projects: ProjectsService;
  audit: SystemLoggingService;
  notifications: NotificationService;
  dispatch: jest.SpyInstance;
  documentTypes: DocumentTypesService;
  deadlines: DeadlinesService;
  submissions: SubmissionsService;
  results: ResultsService;
  marking: MarkingService;
}

/** Wires the real services over one in-memory data source. */
export function createTestContext(env: Record<string, string> = {}): TestContext {
  const dataSource = new InMemoryDataSource().withPrimaryKey(SystemSetting, 'key');
  const ds = dataSource.asDataSource();

  const settings = new SettingsService(dataSource.getRepository(SystemSetting), new ConfigService(env));
  const projects = new ProjectsService(dataSource.getRepository(Project));
  const audit = new SystemLoggingService(dataSource.getRepository(Log));
  const notifications = new NotificationService(dataSource.getRepository(Notification));
  const dispatch = jest.spyOn(notifications, 'dispatch');
  const documentTypes = new DocumentTypesService(
    dataSource.getRepository(DocumentType),
    dataSource.getRepository(ProjectDeadline),
    settings,
    audit,
  );
  const deadlines = new DeadlinesService(
    dataSource.getRepository(DeadlineBatch),
    dataSource.getRepository(ProjectDeadline),
    ds,
    documentTypes,
    projects,
    settings,
    notifications,
    audit,
  );
  const submissions = new SubmissionsService(
    dataSource.getRepository(DocumentSubmission),
    ds,
    documentTypes,
    deadlines,
    projects,
    settings,
    notifications,
    audit,
  );
  const results = new ResultsService(
    dataSource.getRepository(FinalResult),
    ds,
    documentTypes,
    projects,
    settings,
    notifications,
    audit,
  );
  const marking = new MarkingService(
    dataSource.getRepository(DocumentSubmission),
    dataSource.getRepository(SupervisorMarks),
    dataSource.getRepository(EvaluationMarks),
    ds,
    projects,
    settings,
    results,
    notifications,
    audit,
  );

  return { dataSource, settings, projects, audit, notifications, dispatch, documentTypes, deadlines, submissions, results, marking };
}

export async function seedProject(ctx: TestContext, overrides: Partial<Project> = {}): Promise<Project> {
  const repository = ctx.dataSource.repository(Project);
  return repository.save(
    repository.create({
      title: 'Smart Irrigation Controller',
      supervisorId: actors.supervisor.id,
      leaderId: actors.leader.id,
      memberIds: [actors.member.id],
      deadlineBatchId: null,
      ...overrides,
    }),
  );
}

export function seedDocumentType(
  ctx: TestContext,
  code: string,
  displayOrder: number,
  weights: { supervisorWeight: number; committeeWeight: number } = { supervisorWeight: 20, committeeWeight: 80 },
): Promise<DocumentType> {
  return ctx.documentTypes.create({ code, title: code, displayOrder, ...weights }, actors.fypCommittee);
}

/** Uploads, approves and finalizes a submission, leaving it APPROVED and final. */
export async function approvedFinal(ctx: TestContext, project: Project, documentType: DocumentType): Promise<DocumentSubmission> {
  const submission = await ctx.submissions.createSubmission(project.id, documentType.id, FILE, actors.leader);
  await ctx.submissions.review(submission.id, true, undefined, actors.supervisor);
  return ctx.submissions.markFinal(submission.id, actors.leader);
}

/** Drives a submission all the way to LOCKED. */
export async function lockedSubmission(ctx: TestContext, project: Project, documentType: DocumentType): Promise<DocumentSubmission> {
  const submission = await approvedFinal(ctx, project, documentType);
  return ctx.submissions.lock(submission.id, actors.evaluator);
}

/** Locks a submission and records supervisor and finalized committee marks for it. */
export async function evaluatedSubmission(
  ctx: TestContext,
  project: Project,
  documentType: DocumentType,
  supervisorScore: number,
  committeeScore: number,
): Promise<DocumentSubmission> {
  const submission = await lockedSubmission(ctx, project, documentType);
  await ctx.marking.submitSupervisorMarks(submission.id, supervisorScore, actors.supervisor);
  await ctx.marking.submitEvaluationMarks(submission.id, committeeScore, true, actors.evaluator);
  return ctx.submissions.findById(submission.id);
}
