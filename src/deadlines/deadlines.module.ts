import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { DocumentTypesModule } from '../document-types/document-types.module';
import { LogsModule } from '../logs/logs.module';
import { NotificationModule } from '../notifications/notification.module';
import { ProjectsModule } from '../projects/projects.module';
import { SettingsModule } from '../settings/settings.module';
import { DeadlineBatch } from './entities/deadline-batch.entity';
import { ProjectDeadline } from './entities/project-deadline.entity';
import { DeadlinesController } from './deadlines.controller';
import { DeadlinesService } from './deadlines.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([DeadlineBatch, ProjectDeadline]),
    DocumentTypesModule,
    ProjectsModule,
    SettingsModule,
    NotificationModule,
    LogsModule,
    AuthModule,
  ],
  controllers: [DeadlinesController],
  providers: [DeadlinesService],
  exports: [DeadlinesService],
})
export class DeadlinesModule {}
