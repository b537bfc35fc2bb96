import {
  Controller,
  Get,
  Post,
  Param,
  Body,
  UseGuards,
  Request,
  ParseUUIDPipe,
  Version,
  HttpStatus,
  ForbiddenException,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AuthenticatedRequest } from '../auth/auth.dto';
import { Team } from '../entities';
import { toUserProfile } from '../users/users.dto';
import { TeamsService } from './teams.service';
import { AddMemberDto, AssignExerciseDto, CreateTeamDto } from './teams.dto';

function toTeamView(team: Team) {
  return {
    id: team.id,
    name: team.name,
    ownerId: team.ownerId,
    owner: team.owner ? toUserProfile(team.owner) : undefined,
    members: (team.members ?? []).map(toUserProfile),
    exercises: team.exercises ?? [],
    createdAt: team.createdAt,
  };
}

@Controller('teams')
@UseGuards(JwtAuthGuard)
export class TeamsController {
  constructor(private readonly teamsService: TeamsService) {}

  @Post()
  @Version('1')
  async create(@Body() dto: CreateTeamDto, @Request() req: AuthenticatedRequest) {
    const team = await this.teamsService.create(req.user.sub, dto);
    return { statusCode: HttpStatus.CREATED, data: toTeamView(team) };
  }

  @Get(':id')
  @Version('1')
  async findOne(
    @Param('id', ParseUUIDPipe) teamId: string,
    @Request() req: AuthenticatedRequest,
  ) {
    const team = await this.teamsService.findOne(teamId);
    if (!this.teamsService.belongsTo(team, req.user.sub) && !req.user.admin) {
      throw new ForbiddenException('Not a member of this team');
    }
    return { statusCode: HttpStatus.OK, data: toTeamView(team) };
  }

  @Post(':id/members')
  @Version('1')
  async addMember(
    @Param('id', ParseUUIDPipe) teamId: string,
    @Body() dto: AddMemberDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const team = await this.teamsService.addMember(teamId, req.user.sub, dto.email);
    return { statusCode: HttpStatus.OK, data: toTeamView(team) };
  }

  @Post(':id/exercises')
  @Version('1')
  async assignExercise(
    @Param('id', ParseUUIDPipe) teamId: string,
    @Body() dto: AssignExerciseDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const team = await this.teamsService.assignExercise(teamId, req.user.sub, dto.exerciseId);
    return { statusCode: HttpStatus.OK, data: toTeamView(team) };
  }
}
