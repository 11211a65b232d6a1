import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SystemLoggingService } from './system-logging.service';
import { Log } from './logs.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Log])],
  providers: [SystemLoggingService],
  exports: [SystemLoggingService],
})
export class LogsModule {}
