import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Question, User } from '../entities';
import { ValidationFailedException } from '../common/validation';
import { JwtPayload } from '../auth/auth.dto';
import { createTestDataSource } from '../../test/data-source';
import { createExercise, createQuestion, createUser } from '../../test/factories';
import { QuestionsService } from './questions.service';

function actor(user: User): JwtPayload {
  return { sub: user.id, email: user.email, teacher: user.teacher, admin: user.admin };
}

describe('QuestionsService', () => {
  let ds: DataSource;
  let service: QuestionsService;

  beforeEach(async () => {
    ds = await createTestDataSource();
    service = new QuestionsService(ds.getRepository(Question));
  });

  afterEach(async () => {
    await ds.destroy();
  });

  describe('create', () => {
    it('fills in the default score and sort order', async () => {
      const exercise = await createExercise(ds);

      const question = await service.create(exercise, { title: 'Sum', description: 'Add two numbers' });

      expect(question.score).toBe(10);
      expect(question.sortOrder).toBe(0);
      expect(question.exerciseId).toBe(exercise.id);
    });

    it('keeps the given score and sort order', async () => {
      const exercise = await createExercise(ds);

      const question = await service.create(exercise, {
        title: 'Sum',
        description: 'Add two numbers',
        score: 25,
        sortOrder: 3,
      });

      expect(question.score).toBe(25);
      expect(question.sortOrder).toBe(3);
    });

    it('reports a blank title as a field error', async () => {
      const exercise = await createExercise(ds);

      const attempt = service.create(exercise, { title: '', description: 'Add two numbers' });

      await expect(attempt).rejects.toBeInstanceOf(ValidationFailedException);
      await expect(attempt).rejects.toMatchObject({ errors: { title: ["can't be blank"] } });
      expect(await ds.getRepository(Question).count()).toBe(0);
    });
  });

  describe('findOne', () => {
    it('throws for an unknown question', async () => {
      await expect(service.findOne('7c9e6679-7425-40de-944b-e07fc1f90ae7')).rejects.toThrow(
        new NotFoundException('Question not found'),
      );
    });
  });

  describe('findAuthored', () => {
    it('returns the question with its exercise to the author', async () => {
      const author = await createUser(ds, { teacher: true });
      const question = await createQuestion(ds, await createExercise(ds, author));

      const found = await service.findAuthored(question.id, actor(author));

      expect(found.exercise.authorId).toBe(author.id);
    });

    it('returns any question to an admin', async () => {
      const question = await createQuestion(ds);
      const admin = await createUser(ds, { admin: true });

      const found = await service.findAuthored(question.id, actor(admin));

      expect(found.id).toBe(question.id);
    });

    it('refuses a teacher who did not author the exercise', async () => {
      const question = await createQuestion(ds);
      const other = await createUser(ds, { teacher: true });

      await expect(service.findAuthored(question.id, actor(other))).rejects.toThrow(
        new ForbiddenException('Only the exercise author can do this'),
      );
    });
  });
});
