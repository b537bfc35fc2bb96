import { IsEmail, IsString, IsUUID, MaxLength, MinLength } from 'class-validator';

export class CreateTeamDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  name!: string;
}

export class AddMemberDto {
  @IsEmail()
  email!: string;
}

export class AssignExerciseDto {
  @IsUUID()
  exerciseId!: string;
}
