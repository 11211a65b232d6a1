import { Module, MiddlewareConsumer, NestModule } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { SettingsModule } from './settings/settings.module';
import { ProjectsModule } from './projects/projects.module';
import { LogsModule } from './logs/logs.module';
import { NotificationModule } from './notifications/notification.module';
import { DocumentTypesModule } from './document-types/document-types.module';
import { DeadlinesModule } from './deadlines/deadlines.module';
import { DeadlineJobsModule } from './deadlines/deadline-jobs.module';
import { SubmissionsModule } from './submissions/submissions.module';
import { MarkingModule } from './marking/marking.module';
import { ResultsModule } from './results/results.module';
import { RequestContextMiddleware } from './common/request-context/request-context.middleware';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    AuthModule,
    SettingsModule,
    ProjectsModule,
    LogsModule,
    NotificationModule,
    DocumentTypesModule,
    DeadlinesModule,
    DeadlineJobsModule,
    SubmissionsModule,
    MarkingModule,
    ResultsModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
