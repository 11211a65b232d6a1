import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { SystemSetting } from './entities/system-setting.entity';

export const SettingKey = {
  MIN_DEADLINE_GAP_DAYS: 'deadline.min_gap_days',
  REQUIRED_EVALUATORS: 'evaluation.required_evaluators',
  SEQUENTIAL_SUBMISSION: 'submission.sequential',
  ENFORCE_WEIGHT_SUM: 'document_type.enforce_weight_sum',
  REMINDER_WINDOW_HOURS: 'deadline.reminder_window_hours',
} as const;

export type SettingKey = (typeof SettingKey)[keyof typeof SettingKey];

interface NumberSetting {
  key: SettingKey;
  env: string;
  fallback: number;
  min: number;
}

const MIN_DEADLINE_GAP: NumberSetting = { key: SettingKey.MIN_DEADLINE_GAP_DAYS, env: 'MIN_DEADLINE_GAP_DAYS', fallback: 15, min: 0 };
const REQUIRED_EVALUATORS: NumberSetting = { key: SettingKey.REQUIRED_EVALUATORS, env: 'REQUIRED_EVALUATORS', fallback: 1, min: 1 };
const REMINDER_WINDOW: NumberSetting = { key: SettingKey.REMINDER_WINDOW_HOURS, env: 'REMINDER_WINDOW_HOURS', fallback: 48, min: 1 };

/**
 * Read-only settings used by the workflow. A row in `system_settings` wins over
 * the environment, which wins over the built-in default.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  constructor(
    @InjectRepository(SystemSetting)
    private readonly settingRepository: Repository<SystemSetting>,
    private readonly configService: ConfigService,
  ) {}

  getMinDeadlineGapDays(): Promise<number> {
    return this.readNumber(MIN_DEADLINE_GAP);
  }

  getRequiredEvaluatorCount(): Promise<number> {
    return this.readNumber(REQUIRED_EVALUATORS);
  }

  getReminderWindowHours(): Promise<number> {
    return this.readNumber(REMINDER_WINDOW);
  }

  isSequentialSubmissionEnforced(): Promise<boolean> {
    return this.readBoolean(SettingKey.SEQUENTIAL_SUBMISSION, 'SEQUENTIAL_SUBMISSION', false);
  }

  isWeightSumEnforced(): Promise<boolean> {
    return this.readBoolean(SettingKey.ENFORCE_WEIGHT_SUM, 'ENFORCE_WEIGHT_SUM', true);
  }

  private async readNumber(setting: NumberSetting): Promise<number> {
    const stored = await this.settingRepository.findOne({ where: { key: setting.key } });
    if (stored) {
      const parsed = Number(stored.value);
      if (Number.isFinite(parsed) && parsed >= setting.min) return parsed;
      this.logger.warn(`Ignoring invalid value "${stored.value}" for setting ${setting.key}`);
    }
    return Math.max(setting.min, this.configService.getNumber(setting.env, setting.fallback));
  }

  private async readBoolean(key: SettingKey, env: string, fallback: boolean): Promise<boolean> {
    const stored = await this.settingRepository.findOne({ where: { key } });
    if (stored) {
      return ['true', '1', 'yes', 'on'].includes(stored.value.trim().toLowerCase());
    }
    return this.configService.getBoolean(env, fallback);
  }
}
