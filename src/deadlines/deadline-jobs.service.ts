import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { SubmissionsService } from '../submissions/submissions.service';
import { DeadlinesService } from './deadlines.service';

export interface DeadlineJobsReport {
  remindersSent: number;
  passedDeadlinesProcessed: number;
  autoLocked: number;
  failures: string[];
}

/**
 * Runs the reminder pass and the passed-deadline pass on a fixed interval.
 * `DEADLINE_JOB_INTERVAL_MINUTES=0` turns the timer off.
 */
@Injectable()
export class DeadlineJobsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DeadlineJobsService.name);
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly deadlinesService: DeadlinesService,
    private readonly submissionsService: SubmissionsService,
  ) {}

  onModuleInit(): void {
    const minutes = this.configService.getNumber('DEADLINE_JOB_INTERVAL_MINUTES', 15);
    if (minutes <= 0) {
      this.logger.log('Deadline jobs disabled');
      return;
    }
    this.timer = setInterval(() => {
      void this.runOnce();
    }, minutes * 60_000);
    this.timer.unref();
    this.logger.log(`Deadline jobs scheduled every ${minutes} minute(s)`);
  }

  onModuleDestroy(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** One tick. Overlapping ticks are skipped; a failing pass never stops the other. */
  async runOnce(now: Date = new Date()): Promise<DeadlineJobsReport | null> {
    if (this.running) {
      this.logger.warn('Previous deadline job run still in progress, skipping');
      return null;
    }
    this.running = true;
    const report: DeadlineJobsReport = { remindersSent: 0, passedDeadlinesProcessed: 0, autoLocked: 0, failures: [] };
    try {
      try {
        report.remindersSent = await this.deadlinesService.sendDeadlineReminders(now);
      } catch (error) {
        report.failures.push('reminders');
        this.logger.error('Deadline reminder pass failed', error instanceof Error ? error.stack : String(error));
      }
      try {
        const passed = await this.submissionsService.processPassedDeadlines(now);
        report.passedDeadlinesProcessed = passed.processedDeadlines;
        report.autoLocked = passed.locked;
      } catch (error) {
        report.failures.push('passed-deadlines');
        this.logger.error('Passed deadline pass failed', error instanceof Error ? error.stack : String(error));
      }
      return report;
    } finally {
      this.running = false;
    }
  }
}
