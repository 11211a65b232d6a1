import { Body, Controller, Get, Param, ParseUUIDPipe, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RequireCapabilities } from '../common/decorators/capabilities.decorator';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CapabilitiesGuard } from '../common/guards/capabilities.guard';
import { Actor } from '../common/types/actor';
import { Capability } from '../common/types/permissions';
import { EvaluationMarksDto, SupervisorMarksDto } from './dtos/marks.dto';
import { MarkingService } from './marking.service';

@ApiTags('Marking')
@ApiBearerAuth()
@Controller('submissions/:submissionId')
@UseGuards(JwtAuthGuard, CapabilitiesGuard)
export class MarkingController {
  constructor(private readonly markingService: MarkingService) {}

  @Put('supervisor-marks')
  @RequireCapabilities(Capability.SUBMIT_SUPERVISOR_MARKS)
  @ApiOperation({ summary: 'Record or replace the supervisor mark of a locked submission' })
  @ApiResponse({ status: 409, description: 'Submission is not locked or already evaluated' })
  submitSupervisorMarks(
    @Param('submissionId', ParseUUIDPipe) submissionId: string,
    @Body() dto: SupervisorMarksDto,
    @CurrentActor() actor: Actor,
  ) {
    return this.markingService.submitSupervisorMarks(submissionId, dto.score, actor, dto.comments);
  }

  @Put('evaluations/me')
  @RequireCapabilities(Capability.SUBMIT_EVALUATION_MARKS)
  @ApiOperation({ summary: "Record the caller's committee evaluation" })
  @ApiResponse({ status: 409, description: 'Evaluation already finalized or submission not locked' })
  submitEvaluationMarks(
    @Param('submissionId', ParseUUIDPipe) submissionId: string,
    @Body() dto: EvaluationMarksDto,
    @CurrentActor() actor: Actor,
  ) {
    return this.markingService.submitEvaluationMarks(submissionId, dto.score, dto.finalize, actor, dto.comments);
  }

  @Get('evaluations/me')
  @RequireCapabilities(Capability.SUBMIT_EVALUATION_MARKS)
  getMyEvaluation(@Param('submissionId', ParseUUIDPipe) submissionId: string, @CurrentActor() actor: Actor) {
    return this.markingService.getMyEvaluation(submissionId, actor);
  }

  @Get('evaluation-summary')
  @RequireCapabilities(Capability.VIEW_EVALUATION_SUMMARY)
  getEvaluationSummary(@Param('submissionId', ParseUUIDPipe) submissionId: string, @CurrentActor() actor: Actor) {
    return this.markingService.getEvaluationSummary(submissionId, actor);
  }
}
