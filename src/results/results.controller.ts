import { Controller, Get, HttpCode, Param, ParseUUIDPipe, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RequireCapabilities } from '../common/decorators/capabilities.decorator';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CapabilitiesGuard } from '../common/guards/capabilities.guard';
import { Actor } from '../common/types/actor';
import { Capability } from '../common/types/permissions';
import { ResultsService } from './results.service';

@ApiTags('Results')
@ApiBearerAuth()
@Controller('results')
@UseGuards(JwtAuthGuard, CapabilitiesGuard)
export class ResultsController {
  constructor(private readonly resultsService: ResultsService) {}

  @Post(':projectId/compute')
  @HttpCode(200)
  @RequireCapabilities(Capability.COMPUTE_RESULT)
  @ApiOperation({ summary: 'Compute the final result if every required document is evaluated' })
  @ApiResponse({ status: 200, description: 'COMPUTED with the result, or NOT_READY with the pending documents' })
  compute(@Param('projectId', ParseUUIDPipe) projectId: string, @CurrentActor() actor: Actor) {
    return this.resultsService.computeIfReady(projectId, actor);
  }

  @Post(':projectId/release')
  @HttpCode(200)
  @RequireCapabilities(Capability.RELEASE_RESULT)
  @ApiOperation({ summary: 'Release the final result to the students' })
  release(@Param('projectId', ParseUUIDPipe) projectId: string, @CurrentActor() actor: Actor) {
    return this.resultsService.release(projectId, actor);
  }

  @Get(':projectId/released')
  @RequireCapabilities(Capability.VIEW_RELEASED_RESULT)
  getReleased(@Param('projectId', ParseUUIDPipe) projectId: string, @CurrentActor() actor: Actor) {
    return this.resultsService.getReleased(projectId, actor);
  }

  @Get(':projectId')
  @RequireCapabilities(Capability.VIEW_RESULT)
  getResult(@Param('projectId', ParseUUIDPipe) projectId: string, @CurrentActor() actor: Actor) {
    return this.resultsService.getResult(projectId, actor);
  }
}
