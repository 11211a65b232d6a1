import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RequireCapabilities } from '../common/decorators/capabilities.decorator';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CapabilitiesGuard } from '../common/guards/capabilities.guard';
import { Actor } from '../common/types/actor';
import { Capability } from '../common/types/permissions';
import { CreateDocumentTypeDto, SetDocumentTypeActiveDto, UpdateDocumentTypeDto } from './dtos/document-type.dto';
import { DocumentTypesService } from './document-types.service';

@ApiTags('Document Types')
@ApiBearerAuth()
@Controller('document-types')
@UseGuards(JwtAuthGuard, CapabilitiesGuard)
export class DocumentTypesController {
  constructor(private readonly documentTypesService: DocumentTypesService) {}

  @Get()
  @ApiOperation({ summary: 'Active document types in display order' })
  listActive() {
    return this.documentTypesService.listActive();
  }

  @Get('all')
  @RequireCapabilities(Capability.MANAGE_DOCUMENT_TYPES)
  @ApiOperation({ summary: 'All document types, including inactive ones' })
  findAll() {
    return this.documentTypesService.findAll();
  }

  @Get(':id')
  findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.documentTypesService.findById(id);
  }

  @Post()
  @RequireCapabilities(Capability.MANAGE_DOCUMENT_TYPES)
  @ApiOperation({ summary: 'Create a document type' })
  @ApiResponse({ status: 201, description: 'Document type created' })
  @ApiResponse({ status: 400, description: 'Invalid weights or duplicate code' })
  create(@Body() dto: CreateDocumentTypeDto, @CurrentActor() actor: Actor) {
    return this.documentTypesService.create(dto, actor);
  }

  @Patch(':id')
  @RequireCapabilities(Capability.MANAGE_DOCUMENT_TYPES)
  update(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdateDocumentTypeDto, @CurrentActor() actor: Actor) {
    return this.documentTypesService.update(id, dto, actor);
  }

  @Patch(':id/active')
  @RequireCapabilities(Capability.MANAGE_DOCUMENT_TYPES)
  setActive(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SetDocumentTypeActiveDto,
    @CurrentActor() actor: Actor,
  ) {
    return this.documentTypesService.setActive(id, dto.active, actor);
  }
}
