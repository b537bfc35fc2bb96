import { Injectable, NotFoundException, ForbiddenException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Exercise, Question } from '../entities';
import { ValidationFailedException, hasErrors, validateEntity } from '../common/validation';
import { JwtPayload } from '../auth/auth.dto';
import { CreateQuestionDto } from './questions.dto';

@Injectable()
export class QuestionsService {
  private readonly logger = new Logger(QuestionsService.name);

  constructor(
    @InjectRepository(Question) private readonly questionRepo: Repository<Question>,
  ) {}

  async create(exercise: Exercise, dto: CreateQuestionDto): Promise<Question> {
    const question = this.questionRepo.create({
      exerciseId: exercise.id,
      title: dto.title,
      description: dto.description,
      score: dto.score ?? 10,
      sortOrder: dto.sortOrder ?? 0,
    });

    const errors = await validateEntity(question);
    if (hasErrors(errors)) throw new ValidationFailedException(errors);

    const saved = await this.questionRepo.save(question);
    this.logger.log(`Question created: ${saved.id} exercise=${exercise.id}`);
    return saved;
  }

  async findOne(questionId: string): Promise<Question> {
    const question = await this.questionRepo.findOne({ where: { id: questionId } });
    if (!question) throw new NotFoundException('Question not found');
    return question;
  }

  async findWithExercise(questionId: string): Promise<Question> {
    const question = await this.questionRepo.findOne({
      where: { id: questionId },
      relations: ['exercise'],
    });
    if (!question) throw new NotFoundException('Question not found');
    return question;
  }

  /** Question whose exercise the actor authored; admins may change any. */
  async findAuthored(questionId: string, actor: JwtPayload): Promise<Question> {
    const question = await this.findWithExercise(questionId);
    if (!question.exercise.isAuthor(actor.sub) && !actor.admin) {
      this.logger.warn(`User ${actor.sub} tried to modify question ${questionId} without authoring it`);
      throw new ForbiddenException('Only the exercise author can do this');
    }
    return question;
  }
}
