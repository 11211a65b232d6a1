import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { DocumentTypesModule } from '../document-types/document-types.module';
import { LogsModule } from '../logs/logs.module';
import { NotificationModule } from '../notifications/notification.module';
import { ProjectsModule } from '../projects/projects.module';
import { SettingsModule } from '../settings/settings.module';
import { FinalResult } from './entities/final-result.entity';
import { ResultsController } from './results.controller';
import { ResultsService } from './results.service';

@Module({
  imports: [TypeOrmModule.forFeature([FinalResult]), DocumentTypesModule, ProjectsModule, SettingsModule, NotificationModule, LogsModule, AuthModule],
  controllers: [ResultsController],
  providers: [ResultsService],
  exports: [ResultsService],
})
export class ResultsModule {}
