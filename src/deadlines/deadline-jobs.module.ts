import { Module } from '@nestjs/common';
import { SubmissionsModule } from '../submissions/submissions.module';
import { DeadlinesModule } from './deadlines.module';
import { DeadlineJobsService } from './deadline-jobs.service';

@Module({
  imports: [DeadlinesModule, SubmissionsModule],
  providers: [DeadlineJobsService],
})
export class DeadlineJobsModule {}
