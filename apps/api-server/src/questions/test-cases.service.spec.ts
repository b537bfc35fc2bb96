import { DataSource } from 'typeorm';
import { TestCase } from '../entities';
import { ValidationFailedException } from '../common/validation';
import { createTestDataSource } from '../../test/data-source';
import { createQuestion, createTestCase } from '../../test/factories';
import { TestCasesService } from './test-cases.service';

describe('TestCasesService', () => {
  let ds: DataSource;
  let service: TestCasesService;

  beforeEach(async () => {
    ds = await createTestDataSource();
    service = new TestCasesService(ds.getRepository(TestCase));
  });

  afterEach(async () => {
    await ds.destroy();
  });

  describe('create', () => {
    it('stores a missing title as null and a missing input as empty', async () => {
      const question = await createQuestion(ds);

      const testCase = await service.create(question, { output: '42' });

      expect(testCase.title).toBeNull();
      expect(testCase.input).toBe('');
      expect(testCase.output).toBe('42');
      expect(testCase.questionId).toBe(question.id);
    });

    it('refuses a blank expected output', async () => {
      const question = await createQuestion(ds);

      const attempt = service.create(question, { input: '1 2', output: '' });

      await expect(attempt).rejects.toBeInstanceOf(ValidationFailedException);
      await expect(attempt).rejects.toMatchObject({ errors: { output: ["can't be blank"] } });
      expect(await ds.getRepository(TestCase).count()).toBe(0);
    });
  });

  describe('findOne', () => {
    it('throws for an unknown test case', async () => {
      await expect(service.findOne('7c9e6679-7425-40de-944b-e07fc1f90ae7')).rejects.toThrow(
        'Test case not found',
      );
    });
  });

  describe('listForQuestion', () => {
    it("returns only the question's test cases", async () => {
      const question = await createQuestion(ds);
      const mine = await createTestCase(ds, question);
      await createTestCase(ds, await createQuestion(ds));

      const listed = await service.listForQuestion(question.id);

      expect(listed.map((testCase) => testCase.id)).toEqual([mine.id]);
    });
  });
});
