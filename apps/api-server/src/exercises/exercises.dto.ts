import { IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

export class CreateExerciseDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  title!: string;

  @IsOptional()
  @IsString()
  @MaxLength(10000)
  description?: string;
}
