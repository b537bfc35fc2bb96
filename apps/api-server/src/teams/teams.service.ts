import {
  Injectable,
  NotFoundException,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Exercise, Team, User } from '../entities';
import { ValidationFailedException, hasErrors, validateEntity } from '../common/validation';
import { CreateTeamDto } from './teams.dto';

/**
 * TeamsService – Team creation, membership and exercise assignment.
 *
 * Only the owner changes a team. Membership and assignment writes are
 * idempotent: adding an existing member or exercise is a no-op.
 */
@Injectable()
export class TeamsService {
  private readonly logger = new Logger(TeamsService.name);

  constructor(
    @InjectRepository(Team) private readonly teamRepo: Repository<Team>,
    @InjectRepository(User) private readonly userRepo: Repository<User>,
    @InjectRepository(Exercise) private readonly exerciseRepo: Repository<Exercise>,
  ) {}

  async create(ownerId: string, dto: CreateTeamDto): Promise<Team> {
    const team = this.teamRepo.create({ name: dto.name, ownerId });

    const errors = await validateEntity(team);
    if (hasErrors(errors)) throw new ValidationFailedException(errors);

    const saved = await this.teamRepo.save(team);
    this.logger.log(`Team created: ${saved.id} owner=${ownerId}`);
    return saved;
  }

  async findOne(teamId: string): Promise<Team> {
    const team = await this.teamRepo.findOne({
      where: { id: teamId },
      relations: ['owner', 'members', 'exercises'],
    });
    if (!team) throw new NotFoundException('Team not found');
    return team;
  }

  /** Owner or member; `team.members` must be loaded. */
  belongsTo(team: Team, userId: string): boolean {
    return team.ownerId === userId || (team.members ?? []).some((member) => member.id === userId);
  }

  async addMember(teamId: string, actorId: string, email: string): Promise<Team> {
    const team = await this.findOwnedTeam(teamId, actorId);

    const user = await this.userRepo.findOne({ where: { email } });
    if (!user) throw new NotFoundException('User not found');

    if (!team.members.some((member) => member.id === user.id)) {
      await this.teamRepo.createQueryBuilder().relation(Team, 'members').of(team).add(user);
      this.logger.log(`User ${user.id} joined team ${team.id}`);
    }

    return this.findOne(team.id);
  }

  async assignExercise(teamId: string, actorId: string, exerciseId: string): Promise<Team> {
    const team = await this.findOwnedTeam(teamId, actorId);

    const exercise = await this.exerciseRepo.findOne({ where: { id: exerciseId } });
    if (!exercise) throw new NotFoundException('Exercise not found');

    if (!team.exercises.some((assigned) => assigned.id === exercise.id)) {
      await this.teamRepo.createQueryBuilder().relation(Team, 'exercises').of(team).add(exercise);
      this.logger.log(`Exercise ${exercise.id} assigned to team ${team.id}`);
    }

    return this.findOne(team.id);
  }

  hasExercise(team: Team, exerciseId: string): boolean {
    return (team.exercises ?? []).some((exercise) => exercise.id === exerciseId);
  }

  private async findOwnedTeam(teamId: string, actorId: string): Promise<Team> {
    const team = await this.findOne(teamId);
    if (team.ownerId !== actorId) {
      this.logger.warn(`User ${actorId} tried to modify team ${teamId} without owning it`);
      throw new ForbiddenException('Only the team owner can do this');
    }
    return team;
  }
}
