import { Type } from 'class-transformer';
import { IsArray, IsString, IsUUID, MaxLength, ValidateNested } from 'class-validator';

export class TestCaseOutputDto {
  @IsUUID()
  testCaseId!: string;

  /** Emptiness is reported by the result entity as a field error */
  @IsString()
  output!: string;
}

export class SubmitAnswerDto {
  @IsUUID()
  teamId!: string;

  @IsString()
  @MaxLength(100000)
  content!: string;

  /** Output the answer produced for each test case of the question */
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TestCaseOutputDto)
  results!: TestCaseOutputDto[];
}

export class TeamAnswersQueryDto {
  @IsUUID()
  teamId!: string;
}
