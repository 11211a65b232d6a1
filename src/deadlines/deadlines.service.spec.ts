import {
  SchedulingConflictError,
  UnauthorizedActionError,
  ValidationError,
} from '../common/exceptions/domain.exceptions';
import { DocumentType } from '../document-types/entities/document-type.entity';
import { TestContext, actors, createTestContext, seedDocumentType, seedProject } from '../../test/support/test-context';
import { MS_PER_DAY, MS_PER_HOUR } from './deadline-rules';
import { ProjectDeadline } from './entities/project-deadline.entity';

describe('DeadlinesService', () => {
  const start = new Date('2026-03-01T12:00:00.000Z');
  const daysAfter = (days: number) => new Date(start.getTime() + days * MS_PER_DAY);

  let ctx: TestContext;
  let proposal: DocumentType;
  let srs: DocumentType;

  beforeEach(async () => {
    ctx = createTestContext();
    proposal = await seedDocumentType(ctx, 'PROPOSAL', 1);
    srs = await seedDocumentType(ctx, 'SRS', 2);
  });

  const createBatch = (name = 'Spring 2026') =>
    ctx.deadlines.createBatch(
      {
        name,
        deadlines: [
          { documentTypeId: srs.id, deadlineDate: daysAfter(20) },
          { documentTypeId: proposal.id, deadlineDate: start },
        ],
      },
      actors.fypCommittee,
    );

  describe('createBatch', () => {
    it('stores the deadlines in document order', async () => {
      const batch = await createBatch();

      expect(batch.isActive).toBe(true);
      expect(batch.createdBy).toBe(actors.fypCommittee.id);
      expect(batch.deadlines?.map((d) => d.documentTypeId)).toEqual([proposal.id, srs.id]);
      expect(batch.deadlines?.map((d) => d.sortOrder)).toEqual([1, 2]);
    });

    it('rejects a duplicate batch name', async () => {
      await createBatch();

      await expect(createBatch()).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an unknown document type', async () => {
      await expect(
        ctx.deadlines.createBatch(
          { name: 'Broken', deadlines: [{ documentTypeId: 'missing', deadlineDate: start }] },
          actors.fypCommittee,
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('is reserved for the FYP committee', async () => {
      await expect(ctx.deadlines.createBatch({ name: 'Nope' }, actors.supervisor)).rejects.toBeInstanceOf(
        UnauthorizedActionError,
      );
    });
  });

  describe('setDeadlines', () => {
    it('rejects deadlines closer than the minimum gap and keeps the old schedule', async () => {
      const batch = await createBatch();

      await expect(
        ctx.deadlines.setDeadlines(
          batch.id,
          [
            { documentTypeId: proposal.id, deadlineDate: start },
            { documentTypeId: srs.id, deadlineDate: daysAfter(14) },
          ],
          actors.fypCommittee,
        ),
      ).rejects.toBeInstanceOf(SchedulingConflictError);

      const stored = await ctx.dataSource.repository(ProjectDeadline).findBy({ batchId: batch.id });
      expect(stored).toHaveLength(2);
      expect(stored.find((d) => d.documentTypeId === srs.id)?.deadlineDate).toEqual(daysAfter(20));
    });

    it('accepts deadlines exactly the minimum gap apart', async () => {
      const batch = await createBatch();

      const deadlines = await ctx.deadlines.setDeadlines(
        batch.id,
        [
          { documentTypeId: proposal.id, deadlineDate: start },
          { documentTypeId: srs.id, deadlineDate: daysAfter(15) },
        ],
        actors.fypCommittee,
      );

      expect(deadlines.map((d) => d.deadlineDate)).toEqual([start, daysAfter(15)]);
    });

    it('uses the configured minimum gap', async () => {
      ctx = createTestContext({ MIN_DEADLINE_GAP_DAYS: '7' });
      proposal = await seedDocumentType(ctx, 'PROPOSAL', 1);
      srs = await seedDocumentType(ctx, 'SRS', 2);
      const batch = await ctx.deadlines.createBatch({ name: 'Short' }, actors.fypCommittee);

      const deadlines = await ctx.deadlines.setDeadlines(
        batch.id,
        [
          { documentTypeId: proposal.id, deadlineDate: start },
          { documentTypeId: srs.id, deadlineDate: daysAfter(7) },
        ],
        actors.fypCommittee,
      );

      expect(deadlines).toHaveLength(2);
    });
  });

  describe('getProjectDeadlines', () => {
    it('returns an empty list for a project without a batch', async () => {
      const project = await seedProject(ctx);

      expect(await ctx.deadlines.getProjectDeadlines(project.id, start)).toEqual([]);
    });

    it('flags deadlines that have passed', async () => {
      const batch = await createBatch();
      const project = await seedProject(ctx, { deadlineBatchId: batch.id });

      const views = await ctx.deadlines.getProjectDeadlines(project.id, daysAfter(1));

      expect(views.map((v) => [v.documentTypeCode, v.isPast])).toEqual([
        ['PROPOSAL', true],
        ['SRS', false],
      ]);
    });
  });

  describe('sendDeadlineReminders', () => {
    it('reminds the group and supervisor once per deadline inside the window', async () => {
      const batch = await createBatch();
      const project = await seedProject(ctx, { deadlineBatchId: batch.id });
      const now = new Date(start.getTime() - 24 * MS_PER_HOUR);

      expect(await ctx.deadlines.sendDeadlineReminders(now)).toBe(1);
      expect(await ctx.deadlines.sendDeadlineReminders(now)).toBe(0);

      expect(ctx.dispatch).toHaveBeenCalledTimes(1);
      expect(ctx.dispatch).toHaveBeenCalledWith({
        type: 'DeadlineApproaching',
        recipients: [
          { kind: 'user', userId: actors.leader.id },
          { kind: 'user', userId: actors.member.id },
          { kind: 'user', userId: actors.supervisor.id },
        ],
        projectId: project.id,
        documentTypeTitle: 'PROPOSAL',
        deadlineDate: start,
      });
    });

    it('ignores deactivated batches', async () => {
      const batch = await createBatch();
      await seedProject(ctx, { deadlineBatchId: batch.id });
      await ctx.deadlines.deactivateBatch(batch.id, actors.fypCommittee);

      expect(await ctx.deadlines.sendDeadlineReminders(new Date(start.getTime() - MS_PER_HOUR))).toBe(0);
    });
  });
});
