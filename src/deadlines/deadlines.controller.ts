import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RequireCapabilities } from '../common/decorators/capabilities.decorator';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CapabilitiesGuard } from '../common/guards/capabilities.guard';
import { Actor } from '../common/types/actor';
import { Capability } from '../common/types/permissions';
import { CreateDeadlineBatchDto, SetDeadlinesDto } from './dtos/deadline.dto';
import { DeadlinesService } from './deadlines.service';

@ApiTags('Deadlines')
@ApiBearerAuth()
@Controller('deadlines')
@UseGuards(JwtAuthGuard, CapabilitiesGuard)
export class DeadlinesController {
  constructor(private readonly deadlinesService: DeadlinesService) {}

  @Post('batches')
  @RequireCapabilities(Capability.MANAGE_DEADLINES)
  @ApiOperation({ summary: 'Create a deadline batch, optionally with its deadlines' })
  @ApiResponse({ status: 409, description: 'Deadlines too close together' })
  createBatch(@Body() dto: CreateDeadlineBatchDto, @CurrentActor() actor: Actor) {
    return this.deadlinesService.createBatch(dto, actor);
  }

  @Get('batches')
  @RequireCapabilities(Capability.MANAGE_DEADLINES)
  listBatches() {
    return this.deadlinesService.listBatches();
  }

  @Get('batches/:id')
  getBatch(@Param('id', ParseUUIDPipe) id: string) {
    return this.deadlinesService.getBatch(id);
  }

  @Put('batches/:id/deadlines')
  @RequireCapabilities(Capability.MANAGE_DEADLINES)
  @ApiOperation({ summary: 'Replace the deadlines of a batch' })
  @ApiResponse({ status: 409, description: 'Deadlines too close together' })
  setDeadlines(@Param('id', ParseUUIDPipe) id: string, @Body() dto: SetDeadlinesDto, @CurrentActor() actor: Actor) {
    return this.deadlinesService.setDeadlines(id, dto.deadlines, actor);
  }

  @Patch('batches/:id/deactivate')
  @RequireCapabilities(Capability.MANAGE_DEADLINES)
  deactivateBatch(@Param('id', ParseUUIDPipe) id: string, @CurrentActor() actor: Actor) {
    return this.deadlinesService.deactivateBatch(id, actor);
  }

  @Get('projects/:projectId')
  @ApiOperation({ summary: 'Deadlines that apply to a project' })
  getProjectDeadlines(@Param('projectId', ParseUUIDPipe) projectId: string) {
    return this.deadlinesService.getProjectDeadlines(projectId);
  }
}
