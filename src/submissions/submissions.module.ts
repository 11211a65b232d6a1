import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { DeadlinesModule } from '../deadlines/deadlines.module';
import { DocumentTypesModule } from '../document-types/document-types.module';
import { LogsModule } from '../logs/logs.module';
import { NotificationModule } from '../notifications/notification.module';
import { ProjectsModule } from '../projects/projects.module';
import { SettingsModule } from '../settings/settings.module';
import { DocumentSubmission } from './entities/document-submission.entity';
import { SubmissionsController } from './submissions.controller';
import { SubmissionsService } from './submissions.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([DocumentSubmission]),
    DocumentTypesModule,
    DeadlinesModule,
    ProjectsModule,
    SettingsModule,
    NotificationModule,
    LogsModule,
    AuthModule,
  ],
  controllers: [SubmissionsController],
  providers: [SubmissionsService],
  exports: [SubmissionsService],
})
export class SubmissionsModule {}
