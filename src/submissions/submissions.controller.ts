import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RequireCapabilities } from '../common/decorators/capabilities.decorator';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { CapabilitiesGuard } from '../common/guards/capabilities.guard';
import { Actor } from '../common/types/actor';
import { Capability } from '../common/types/permissions';
import { CreateSubmissionDto, ReviewSubmissionDto } from './dtos/submission.dto';
import { SubmissionsService } from './submissions.service';

@ApiTags('Submissions')
@ApiBearerAuth()
@Controller('submissions')
@UseGuards(JwtAuthGuard, CapabilitiesGuard)
export class SubmissionsController {
  constructor(private readonly submissionsService: SubmissionsService) {}

  @Post()
  @RequireCapabilities(Capability.SUBMIT_DOCUMENT)
  @ApiOperation({ summary: 'Upload a new revision of a project document' })
  @ApiResponse({ status: 409, description: 'The document already has a final submission' })
  async create(@Body() dto: CreateSubmissionDto, @CurrentActor() actor: Actor) {
    const submission = await this.submissionsService.createSubmission(
      dto.projectId,
      dto.documentTypeId,
      { fileId: dto.fileId, fileUrl: dto.fileUrl },
      actor,
      { comments: dto.comments, draft: dto.draft },
    );
    return this.submissionsService.toDto(submission, submission.version);
  }

  @Get('awaiting-evaluation')
  @RequireCapabilities(Capability.SUBMIT_EVALUATION_MARKS, Capability.VIEW_EVALUATION_SUMMARY)
  listAwaitingEvaluation(@CurrentActor() actor: Actor) {
    return this.submissionsService.listAwaitingEvaluation(actor);
  }

  @Get('project/:projectId')
  @RequireCapabilities(Capability.VIEW_SUBMISSIONS)
  listForProject(@Param('projectId', ParseUUIDPipe) projectId: string, @CurrentActor() actor: Actor) {
    return this.submissionsService.listForProject(projectId, actor);
  }

  @Get(':id')
  @RequireCapabilities(Capability.VIEW_SUBMISSIONS)
  findOne(@Param('id', ParseUUIDPipe) id: string, @CurrentActor() actor: Actor) {
    return this.submissionsService.getSubmission(id, actor);
  }

  @Patch(':id/submit')
  @RequireCapabilities(Capability.SUBMIT_DOCUMENT)
  @ApiOperation({ summary: 'Send a draft for supervisor review' })
  submitDraft(@Param('id', ParseUUIDPipe) id: string, @CurrentActor() actor: Actor) {
    return this.submissionsService.submitDraft(id, actor);
  }

  @Patch(':id/review')
  @RequireCapabilities(Capability.REVIEW_SUBMISSION)
  @ApiOperation({ summary: 'Approve a submission or request a revision' })
  review(@Param('id', ParseUUIDPipe) id: string, @Body() dto: ReviewSubmissionDto, @CurrentActor() actor: Actor) {
    return this.submissionsService.review(id, dto.approve, dto.feedback, actor);
  }

  @Patch(':id/final')
  @RequireCapabilities(Capability.MARK_FINAL)
  markFinal(@Param('id', ParseUUIDPipe) id: string, @CurrentActor() actor: Actor) {
    return this.submissionsService.markFinal(id, actor);
  }

  // No capability gate here: a submission in the wrong state reports that first.
  @Patch(':id/lock')
  @ApiOperation({ summary: 'Lock a final, approved submission for evaluation' })
  lock(@Param('id', ParseUUIDPipe) id: string, @CurrentActor() actor: Actor) {
    return this.submissionsService.lock(id, actor);
  }
}
