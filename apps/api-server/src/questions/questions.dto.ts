import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { DEPENDENCY_OPERATORS, DependencyOperator } from '../entities/question-dependency.entity';

export class CreateQuestionDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  title!: string;

  @IsString()
  @MinLength(1)
  description!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  score?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  sortOrder?: number;
}

export class CreateDependencyDto {
  /** The question that must be completed first */
  @IsUUID()
  prerequisiteId!: string;

  @IsIn(DEPENDENCY_OPERATORS)
  operator!: DependencyOperator;
}

export class CreateTestCaseDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string;

  @IsOptional()
  @IsString()
  input?: string;

  @IsString()
  @MinLength(1)
  output!: string;
}

export class AvailabilityQueryDto {
  @IsUUID()
  teamId!: string;
}
