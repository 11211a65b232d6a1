import { ConfigService } from '../config/config.service';
import { UnauthorizedActionError, ValidationError, NotFoundError } from '../common/exceptions/domain.exceptions';
import { Role } from '../common/types/permissions';
import { ProjectDeadline } from '../deadlines/entities/project-deadline.entity';
import { Log } from '../logs/logs.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { SystemSetting } from '../settings/entities/system-setting.entity';
import { SettingsService } from '../settings/settings.service';
import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import { DocumentType } from './entities/document-type.entity';
import { DocumentTypesService, validateWeights } from './document-types.service';

describe('validateWeights', () => {
  it('accepts weights adding up to 100', () => {
    expect(() => validateWeights(20, 80, true)).not.toThrow();
  });

  it('rejects weights that do not add up to 100 when enforced', () => {
    expect(() => validateWeights(30, 80, true)).toThrow(ValidationError);
    expect(() => validateWeights(30, 80, false)).not.toThrow();
  });

  it('rejects out-of-range and fractional weights', () => {
    expect(() => validateWeights(-1, 101, false)).toThrow(ValidationError);
    expect(() => validateWeights(20.5, 79.5, true)).toThrow(ValidationError);
  });
});

describe('DocumentTypesService', () => {
  const committee = { id: 'fyp-1', role: Role.FYP_COMMITTEE };
  let dataSource: InMemoryDataSource;
  let service: DocumentTypesService;

  const build = (env: Record<string, string> = {}) => {
    const settings = new SettingsService(dataSource.getRepository(SystemSetting), new ConfigService(env));
    return new DocumentTypesService(
      dataSource.getRepository(DocumentType),
      dataSource.getRepository(ProjectDeadline),
      settings,
      new SystemLoggingService(dataSource.getRepository(Log)),
    );
  };

  const create = (code: string, displayOrder: number) =>
    service.create({ code, title: code, supervisorWeight: 20, committeeWeight: 80, displayOrder }, committee);

  beforeEach(() => {
    dataSource = new InMemoryDataSource().withPrimaryKey(SystemSetting, 'key');
    service = build();
  });

  it('creates an active document type and records an audit entry', async () => {
    const created = await create('PROPOSAL', 1);

    expect(created.isActive).toBe(true);
    expect(created.description).toBeNull();
    const [entry] = await dataSource.repository(Log).findBy({ entityId: created.id });
    expect(entry.action).toBe('DOCUMENT_TYPE_CREATED');
    expect(entry.details).toEqual({ code: 'PROPOSAL', supervisorWeight: 20, committeeWeight: 80 });
  });

  it('rejects a duplicate code', async () => {
    await create('PROPOSAL', 1);

    await expect(create('PROPOSAL', 2)).rejects.toBeInstanceOf(ValidationError);
  });

  it('requires the manage capability', async () => {
    await expect(
      service.create(
        { code: 'SRS', title: 'SRS', supervisorWeight: 20, committeeWeight: 80, displayOrder: 1 },
        { id: 'student-1', role: Role.STUDENT },
      ),
    ).rejects.toBeInstanceOf(UnauthorizedActionError);
  });

  it('allows free weights when the sum is not enforced', async () => {
    service = build({ ENFORCE_WEIGHT_SUM: 'false' });

    const created = await service.create(
      { code: 'DEMO', title: 'Demo', supervisorWeight: 50, committeeWeight: 25, displayOrder: 4 },
      committee,
    );

    expect(created.supervisorWeight + created.committeeWeight).toBe(75);
  });

  it('validates the merged weights on update', async () => {
    const created = await create('SRS', 2);

    await expect(service.update(created.id, { supervisorWeight: 30 }, committee)).rejects.toBeInstanceOf(
      ValidationError,
    );
    const updated = await service.update(created.id, { supervisorWeight: 30, committeeWeight: 70 }, committee);
    expect(updated.supervisorWeight).toBe(30);
    expect((await service.findById(created.id)).committeeWeight).toBe(70);
  });

  it('lists active types by display order then code', async () => {
    await create('SDS', 3);
    await create('SRS', 2);
    await create('PROPOSAL', 1);
    const hidden = await create('POSTER', 2);
    await service.setActive(hidden.id, false, committee);

    expect((await service.listActive()).map((t) => t.code)).toEqual(['PROPOSAL', 'SRS', 'SDS']);
    expect((await service.findAll()).map((t) => t.code)).toEqual(['PROPOSAL', 'POSTER', 'SRS', 'SDS']);
  });

  it('raises NotFound for an unknown id', async () => {
    await expect(service.findById('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  describe('requiredForProject', () => {
    it('uses every active type when the project has no batch', async () => {
      await create('SRS', 2);
      await create('PROPOSAL', 1);

      const required = await service.requiredForProject({ id: 'p1', deadlineBatchId: null });

      expect(required.map((t) => t.code)).toEqual(['PROPOSAL', 'SRS']);
    });

    it('follows the batch deadlines in sort order', async () => {
      const proposal = await create('PROPOSAL', 1);
      const srs = await create('SRS', 2);
      await create('SDS', 3);
      const deadlines = dataSource.repository(ProjectDeadline);
      await deadlines.save([
        deadlines.create({ batchId: 'batch-1', documentTypeId: srs.id, sortOrder: 2, deadlineDate: new Date('2026-02-01') }),
        deadlines.create({ batchId: 'batch-1', documentTypeId: proposal.id, sortOrder: 1, deadlineDate: new Date('2026-01-01') }),
      ]);

      const required = await service.requiredForProject({ id: 'p1', deadlineBatchId: 'batch-1' });

      expect(required.map((t) => t.code)).toEqual(['PROPOSAL', 'SRS']);
    });
  });
});
