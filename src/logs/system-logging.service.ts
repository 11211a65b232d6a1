import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Actor } from '../common/types/actor';
import { RequestContext } from '../common/request-context/request-context';
import { AUDIT_TARGETS, AuditEvent } from './audit-events';
import { Log } from './logs.entity';

/**
 * Audit trail of workflow actions. Callers record after their transaction has
 * committed; a failed write is logged and never reaches the caller.
 */
@Injectable()
export class SystemLoggingService {
  private readonly logger = new Logger(SystemLoggingService.name);

  constructor(
    @InjectRepository(Log)
    private logRepository: Repository<Log>,
  ) {}

  async record(actor: Actor, event: AuditEvent, entityId: string): Promise<void> {
    const target = AUDIT_TARGETS[event.action];
    const context = RequestContext.get();
    try {
      const log = this.logRepository.create({
        action: event.action,
        module: target.module,
        level: 'info',
        performedBy: { id: actor.id, role: actor.role, name: actor.name ?? null, email: actor.email ?? null },
        entityId,
        entityType: target.entityType,
        details: event.details,
        requestId: context?.requestId ?? null,
        ipAddress: context?.ip ?? null,
        userAgent: context?.userAgent ?? null,
      });
      await this.logRepository.save(log);
      this.logger.log(`[${target.module}] ${event.action} ${target.entityType}:${entityId} by ${actor.role}:${actor.id}`);
    } catch (error) {
      const stack = error instanceof Error ? error.stack : String(error);
      this.logger.error(`Failed to save audit entry ${event.action} for ${entityId}`, stack);
    }
  }

  findForEntity(entityId: string): Promise<Log[]> {
    return this.logRepository.find({ where: { entityId }, order: { timestamp: 'ASC' } });
  }
}
