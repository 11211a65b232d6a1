import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { LogsModule } from '../logs/logs.module';
import { NotificationModule } from '../notifications/notification.module';
import { ProjectsModule } from '../projects/projects.module';
import { ResultsModule } from '../results/results.module';
import { SettingsModule } from '../settings/settings.module';
import { DocumentSubmission } from '../submissions/entities/document-submission.entity';
import { EvaluationMarks } from './entities/evaluation-marks.entity';
import { SupervisorMarks } from './entities/supervisor-marks.entity';
import { MarkingController } from './marking.controller';
import { MarkingService } from './marking.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([DocumentSubmission, SupervisorMarks, EvaluationMarks]),
    ProjectsModule,
    SettingsModule,
    ResultsModule,
    NotificationModule,
    LogsModule,
    AuthModule,
  ],
  controllers: [MarkingController],
  providers: [MarkingService],
})
export class MarkingModule {}
