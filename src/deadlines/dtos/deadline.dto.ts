import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsDate,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  ValidateNested,
} from 'class-validator';

export class DeadlineEntryDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  documentTypeId!: string;

  @ApiProperty({ type: String, format: 'date-time', example: '2026-02-15T23:59:00.000Z' })
  @Type(() => Date)
  @IsDate()
  deadlineDate!: Date;
}

export class SetDeadlinesDto {
  @ApiProperty({ type: [DeadlineEntryDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => DeadlineEntryDto)
  deadlines!: DeadlineEntryDto[];
}

export class CreateDeadlineBatchDto {
  @ApiProperty({ example: 'Spring 2026 cohort' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  name!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ type: String, format: 'date-time' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  appliesFrom?: Date;

  @ApiPropertyOptional({ type: String, format: 'date-time' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  appliesUntil?: Date;

  @ApiPropertyOptional({ type: [DeadlineEntryDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DeadlineEntryDto)
  deadlines?: DeadlineEntryDto[];
}

export interface ProjectDeadlineView {
  id: string;
  documentTypeId: string;
  documentTypeCode: string;
  documentTypeTitle: string;
  deadlineDate: Date;
  sortOrder: number;
  isPast: boolean;
}
