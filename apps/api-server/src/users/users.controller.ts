import {
  Controller,
  Get,
  Patch,
  Param,
  Body,
  UseGuards,
  Request,
  ParseUUIDPipe,
  Version,
  HttpStatus,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AdminGuard } from '../auth/admin.guard';
import { AuthenticatedRequest } from '../auth/auth.dto';
import { UsersService } from './users.service';
import { UpdateTeacherRoleDto, toUserProfile } from './users.dto';

@Controller('users')
@UseGuards(JwtAuthGuard)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  @Version('1')
  async me(@Request() req: AuthenticatedRequest) {
    const user = await this.usersService.findById(req.user.sub);
    return { statusCode: HttpStatus.OK, data: toUserProfile(user) };
  }

  @Get('me/teams')
  @Version('1')
  async myTeams(@Request() req: AuthenticatedRequest) {
    const user = await this.usersService.findById(req.user.sub);
    const teams = await this.usersService.teamsFromWhereBelongs(user);
    return {
      statusCode: HttpStatus.OK,
      data: teams.map((team) => ({ ...team, owned: user.isOwner(team) })),
    };
  }

  @Get()
  @Version('1')
  @UseGuards(AdminGuard)
  async list() {
    const users = await this.usersService.list();
    return { statusCode: HttpStatus.OK, data: users.map(toUserProfile) };
  }

  @Patch(':id/teacher')
  @Version('1')
  @UseGuards(AdminGuard)
  async setTeacher(@Param('id', ParseUUIDPipe) userId: string, @Body() dto: UpdateTeacherRoleDto) {
    const user = await this.usersService.setTeacher(userId, dto.teacher);
    return { statusCode: HttpStatus.OK, data: toUserProfile(user) };
  }
}
