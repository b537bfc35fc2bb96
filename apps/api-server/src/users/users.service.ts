import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { Team, User } from '../entities';
import { addError, hasErrors, validateEntity, ValidationErrors } from '../common/validation';

export type SaveUserResult =
  | { saved: true; user: User }
  | { saved: false; errors: ValidationErrors };

/**
 * UsersService – Validation lifecycle and team relations of users.
 *
 * Lifecycle of a new user:
 * 1. before validation: `generateAnonymousId()` fills a blank anonymous id
 * 2. field rules declared on the entity (presence, email grammar)
 * 3. email uniqueness against every other stored user
 * 4. password hashed with bcrypt, record inserted
 *
 * Invalid input is not an exception: `save` returns the violation set and
 * nothing is written.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly saltRounds: number;

  constructor(
    @InjectRepository(User) private readonly userRepo: Repository<User>,
    private readonly config: ConfigService,
  ) {
    this.saltRounds = Number(this.config.get<number>('BCRYPT_SALT_ROUNDS', 12));
  }

  async validate(user: User): Promise<ValidationErrors> {
    if (!user.id) {
      user.generateAnonymousId();
    }

    const errors = await validateEntity(user);

    if (user.email) {
      const existing = await this.userRepo.findOne({ where: { email: user.email } });
      if (existing && existing.id !== user.id) {
        addError(errors, 'email', 'has already been taken');
      }
    }

    return errors;
  }

  async save(user: User): Promise<SaveUserResult> {
    const errors = await this.validate(user);
    if (hasErrors(errors)) {
      return { saved: false, errors };
    }

    if (user.password) {
      user.passwordHash = await bcrypt.hash(user.password, this.saltRounds);
      user.password = undefined;
    }

    const saved = await this.userRepo.save(user);
    this.logger.log(`User saved: ${saved.id}`);
    return { saved: true, user: saved };
  }

  async findById(id: string): Promise<User> {
    const user = await this.userRepo.findOne({ where: { id } });
    if (!user) throw new NotFoundException('User not found');
    return user;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.userRepo.findOne({ where: { email } });
  }

  /** Admin listing, newest first */
  async list(): Promise<User[]> {
    return this.userRepo.find({ order: { createdAt: 'DESC' } });
  }

  /** Teacher role is granted and revoked by admins only. */
  async setTeacher(userId: string, teacher: boolean): Promise<User> {
    const user = await this.findById(userId);
    user.teacher = teacher;
    const saved = await this.userRepo.save(user);
    this.logger.log(`Teacher role ${teacher ? 'granted to' : 'revoked from'} user ${userId}`);
    return saved;
  }

  async updateRefreshTokenHash(userId: string, hash: string | null): Promise<void> {
    await this.userRepo.update(userId, { refreshTokenHash: hash });
  }

  /** Teams the user owns or is a member of, each listed once. */
  async teamsFromWhereBelongs(user: User): Promise<Team[]> {
    return this.userRepo.manager
      .getRepository(Team)
      .createQueryBuilder('team')
      .leftJoin('team.members', 'member')
      .where('team.ownerId = :userId', { userId: user.id })
      .orWhere('member.id = :userId', { userId: user.id })
      .orderBy('team.createdAt', 'ASC')
      .getMany();
  }
}
