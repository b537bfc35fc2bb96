import { Injectable, NotFoundException, ForbiddenException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Exercise } from '../entities';
import { ValidationFailedException, hasErrors, validateEntity } from '../common/validation';
import { JwtPayload } from '../auth/auth.dto';
import { CreateExerciseDto } from './exercises.dto';

/**
 * ExercisesService – Authoring and lookup of exercises.
 */
@Injectable()
export class ExercisesService {
  private readonly logger = new Logger(ExercisesService.name);

  constructor(
    @InjectRepository(Exercise) private readonly exerciseRepo: Repository<Exercise>,
  ) {}

  async create(authorId: string, dto: CreateExerciseDto): Promise<Exercise> {
    const exercise = this.exerciseRepo.create({
      title: dto.title,
      description: dto.description ?? null,
      authorId,
    });

    const errors = await validateEntity(exercise);
    if (hasErrors(errors)) throw new ValidationFailedException(errors);

    const saved = await this.exerciseRepo.save(exercise);
    this.logger.log(`Exercise created: ${saved.id} author=${authorId}`);
    return saved;
  }

  /** Exercise with its questions in display order */
  async findOne(exerciseId: string): Promise<Exercise> {
    const exercise = await this.exerciseRepo.findOne({
      where: { id: exerciseId },
      relations: ['questions'],
      order: { questions: { sortOrder: 'ASC' } },
    });
    if (!exercise) throw new NotFoundException('Exercise not found');
    return exercise;
  }

  /** Exercise the actor may change: authored by them, or any for admins. */
  async findAuthored(exerciseId: string, actor: JwtPayload): Promise<Exercise> {
    const exercise = await this.findOne(exerciseId);
    if (!exercise.isAuthor(actor.sub) && !actor.admin) {
      this.logger.warn(`User ${actor.sub} tried to modify exercise ${exerciseId} without authoring it`);
      throw new ForbiddenException('Only the exercise author can do this');
    }
    return exercise;
  }

  async listByAuthor(authorId: string): Promise<Exercise[]> {
    return this.exerciseRepo.find({
      where: { authorId },
      order: { createdAt: 'DESC' },
    });
  }
}
