import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class SupervisorMarksDto {
  @ApiProperty({ minimum: 0, maximum: 100, example: 80.5 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  score!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  comments?: string;
}

export class EvaluationMarksDto extends SupervisorMarksDto {
  @ApiProperty({ description: 'Freeze this evaluation; it cannot be edited afterwards' })
  @IsBoolean()
  finalize!: boolean;
}

export interface EvaluationRowView {
  evaluatorId: string;
  score: number;
  comments: string | null;
  isFinal: boolean;
  finalizedAt: Date | null;
}

export interface EvaluationSummary {
  submissionId: string;
  projectId: string;
  status: string;
  requiredEvaluators: number;
  submittedEvaluators: number;
  finalizedEvaluators: number;
  averageScore: number | null;
  hasSupervisorMarks: boolean;
  supervisorScore: number | null;
  allRequiredFinalized: boolean;
  complete: boolean;
  evaluations: EvaluationRowView[];
}
