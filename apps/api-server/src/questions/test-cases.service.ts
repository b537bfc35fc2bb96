import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Question, TestCase } from '../entities';
import { ValidationFailedException, hasErrors, validateEntity } from '../common/validation';
import { CreateTestCaseDto } from './questions.dto';

@Injectable()
export class TestCasesService {
  private readonly logger = new Logger(TestCasesService.name);

  constructor(
    @InjectRepository(TestCase) private readonly testCaseRepo: Repository<TestCase>,
  ) {}

  async create(question: Question, dto: CreateTestCaseDto): Promise<TestCase> {
    const testCase = this.testCaseRepo.create({
      questionId: question.id,
      title: dto.title ?? null,
      input: dto.input ?? '',
      output: dto.output,
    });

    const errors = await validateEntity(testCase);
    if (hasErrors(errors)) throw new ValidationFailedException(errors);

    const saved = await this.testCaseRepo.save(testCase);
    this.logger.log(`Test case created: ${saved.id} question=${question.id}`);
    return saved;
  }

  async findOne(testCaseId: string): Promise<TestCase> {
    const testCase = await this.testCaseRepo.findOne({ where: { id: testCaseId } });
    if (!testCase) throw new NotFoundException('Test case not found');
    return testCase;
  }

  async listForQuestion(questionId: string): Promise<TestCase[]> {
    return this.testCaseRepo.find({
      where: { questionId },
      order: { createdAt: 'ASC' },
    });
  }
}
