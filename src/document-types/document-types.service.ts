import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { NotFoundError, ValidationError } from '../common/exceptions/domain.exceptions';
import { assertCapability } from '../common/guards/capabilities';
import { Actor } from '../common/types/actor';
import { Capability } from '../common/types/permissions';
import { ProjectDeadline } from '../deadlines/entities/project-deadline.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { Project } from '../projects/entities/project.entity';
import { SettingsService } from '../settings/settings.service';
import { CreateDocumentTypeDto, UpdateDocumentTypeDto } from './dtos/document-type.dto';
import { DocumentType } from './entities/document-type.entity';

export function validateWeights(supervisorWeight: number, committeeWeight: number, enforceSum: boolean): void {
  for (const [field, weight] of [
    ['supervisorWeight', supervisorWeight],
    ['committeeWeight', committeeWeight],
  ] as const) {
    if (!Number.isInteger(weight) || weight < 0 || weight > 100) {
      throw new ValidationError(`${field} must be an integer between 0 and 100`, { field, value: weight });
    }
  }
  if (enforceSum && supervisorWeight + committeeWeight !== 100) {
    throw new ValidationError('Supervisor and committee weights must add up to 100', {
      supervisorWeight,
      committeeWeight,
    });
  }
}

function byDisplayOrder(a: DocumentType, b: DocumentType): number {
  return a.displayOrder - b.displayOrder || a.code.localeCompare(b.code);
}

@Injectable()
export class DocumentTypesService {
  private readonly logger = new Logger(DocumentTypesService.name);

  constructor(
    @InjectRepository(DocumentType)
    private readonly documentTypeRepository: Repository<DocumentType>,
    @InjectRepository(ProjectDeadline)
    private readonly deadlineRepository: Repository<ProjectDeadline>,
    private readonly settingsService: SettingsService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  async create(dto: CreateDocumentTypeDto, actor: Actor): Promise<DocumentType> {
    assertCapability(actor, Capability.MANAGE_DOCUMENT_TYPES);
    validateWeights(dto.supervisorWeight, dto.committeeWeight, await this.settingsService.isWeightSumEnforced());

    const existing = await this.documentTypeRepository.findOne({ where: { code: dto.code } });
    if (existing) {
      throw new ValidationError(`Document type code ${dto.code} is already in use`, { code: dto.code });
    }

    const saved = await this.documentTypeRepository.save(
      this.documentTypeRepository.create({
        code: dto.code,
        title: dto.title,
        description: dto.description ?? null,
        supervisorWeight: dto.supervisorWeight,
        committeeWeight: dto.committeeWeight,
        displayOrder: dto.displayOrder,
        isActive: true,
      }),
    );
    this.logger.log(`Document type ${saved.code} created`);
    await this.systemLoggingService.record(
      actor,
      {
        action: 'DOCUMENT_TYPE_CREATED',
        details: { code: saved.code, supervisorWeight: saved.supervisorWeight, committeeWeight: saved.committeeWeight },
      },
      saved.id,
    );
    return saved;
  }

  /** Weight edits only affect results computed afterwards. */
  async update(id: string, dto: UpdateDocumentTypeDto, actor: Actor): Promise<DocumentType> {
    assertCapability(actor, Capability.MANAGE_DOCUMENT_TYPES);
    const documentType = await this.findById(id);

    const changedFields: string[] = [];
    if (dto.title !== undefined && dto.title !== documentType.title) {
      documentType.title = dto.title;
      changedFields.push('title');
    }
    if (dto.description !== undefined && dto.description !== documentType.description) {
      documentType.description = dto.description;
      changedFields.push('description');
    }
    if (dto.supervisorWeight !== undefined && dto.supervisorWeight !== documentType.supervisorWeight) {
      documentType.supervisorWeight = dto.supervisorWeight;
      changedFields.push('supervisorWeight');
    }
    if (dto.committeeWeight !== undefined && dto.committeeWeight !== documentType.committeeWeight) {
      documentType.committeeWeight = dto.committeeWeight;
      changedFields.push('committeeWeight');
    }
    if (dto.displayOrder !== undefined && dto.displayOrder !== documentType.displayOrder) {
      documentType.displayOrder = dto.displayOrder;
      changedFields.push('displayOrder');
    }
    if (changedFields.length === 0) return documentType;

    validateWeights(
      documentType.supervisorWeight,
      documentType.committeeWeight,
      await this.settingsService.isWeightSumEnforced(),
    );
    const saved = await this.documentTypeRepository.save(documentType);
    await this.systemLoggingService.record(actor, { action: 'DOCUMENT_TYPE_UPDATED', details: { changedFields } }, id);
    return saved;
  }

  async setActive(id: string, active: boolean, actor: Actor): Promise<DocumentType> {
    assertCapability(actor, Capability.MANAGE_DOCUMENT_TYPES);
    const documentType = await this.findById(id);
    if (documentType.isActive === active) return documentType;

    documentType.isActive = active;
    const saved = await this.documentTypeRepository.save(documentType);
    await this.systemLoggingService.record(actor, { action: 'DOCUMENT_TYPE_ACTIVATION_CHANGED', details: { active } }, id);
    return saved;
  }

  async listActive(): Promise<DocumentType[]> {
    const types = await this.documentTypeRepository.find({ where: { isActive: true } });
    return types.sort(byDisplayOrder);
  }

  async findAll(): Promise<DocumentType[]> {
    const types = await this.documentTypeRepository.find();
    return types.sort(byDisplayOrder);
  }

  async findById(id: string): Promise<DocumentType> {
    const documentType = await this.documentTypeRepository.findOne({ where: { id } });
    if (!documentType) throw new NotFoundError('DocumentType', id);
    return documentType;
  }

  /**
   * Document types a project must deliver: its batch's deadlines in sortOrder,
   * or every active type when the project has no batch.
   */
  async requiredForProject(project: Pick<Project, 'id' | 'deadlineBatchId'>): Promise<DocumentType[]> {
    if (!project.deadlineBatchId) {
      return this.listActive();
    }

    const deadlines = await this.deadlineRepository.find({
      where: { batchId: project.deadlineBatchId },
      order: { sortOrder: 'ASC' },
    });
    const typesById = new Map((await this.findAll()).map((t) => [t.id, t]));
    return deadlines.flatMap((deadline) => {
      const documentType = typesById.get(deadline.documentTypeId);
      if (!documentType) {
        this.logger.warn(`Deadline ${deadline.id} references missing document type ${deadline.documentTypeId}`);
        return [];
      }
      return [documentType];
    });
  }
}
