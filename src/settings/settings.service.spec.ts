import { ConfigService } from '../config/config.service';
import { InMemoryDataSource } from '../../test/support/in-memory-data-source';
import { SystemSetting } from './entities/system-setting.entity';
import { SettingKey, SettingsService } from './settings.service';

describe('SettingsService', () => {
  let dataSource: InMemoryDataSource;

  const build = (env: Record<string, string> = {}) =>
    new SettingsService(dataSource.getRepository(SystemSetting), new ConfigService(env));

  const store = (key: string, value: string) => {
    const repo = dataSource.repository(SystemSetting);
    return repo.save(repo.create({ key, value, description: null }));
  };

  beforeEach(() => {
    dataSource = new InMemoryDataSource().withPrimaryKey(SystemSetting, 'key');
  });

  it('falls back to built-in defaults', async () => {
    const service = build();

    expect(await service.getMinDeadlineGapDays()).toBe(15);
    expect(await service.getRequiredEvaluatorCount()).toBe(1);
    expect(await service.getReminderWindowHours()).toBe(48);
    expect(await service.isSequentialSubmissionEnforced()).toBe(false);
    expect(await service.isWeightSumEnforced()).toBe(true);
  });

  it('reads environment overrides', async () => {
    const service = build({ MIN_DEADLINE_GAP_DAYS: '10', SEQUENTIAL_SUBMISSION: 'yes', ENFORCE_WEIGHT_SUM: 'false' });

    expect(await service.getMinDeadlineGapDays()).toBe(10);
    expect(await service.isSequentialSubmissionEnforced()).toBe(true);
    expect(await service.isWeightSumEnforced()).toBe(false);
  });

  it('prefers a stored setting over the environment', async () => {
    await store(SettingKey.REQUIRED_EVALUATORS, '3');
    const service = build({ REQUIRED_EVALUATORS: '2' });

    expect(await service.getRequiredEvaluatorCount()).toBe(3);
  });

  it('ignores a stored value below the minimum', async () => {
    await store(SettingKey.REQUIRED_EVALUATORS, '0');
    const service = build({ REQUIRED_EVALUATORS: '2' });

    expect(await service.getRequiredEvaluatorCount()).toBe(2);
  });

  it('clamps an environment value to the minimum', async () => {
    const service = build({ REQUIRED_EVALUATORS: '0' });

    expect(await service.getRequiredEvaluatorCount()).toBe(1);
  });
});
