import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Answer, AnswerTestCaseResult, TestCase } from '../entities';

@Injectable()
export class AnswerTestCaseResultsService {
  constructor(
    @InjectRepository(AnswerTestCaseResult)
    private readonly resultRepo: Repository<AnswerTestCaseResult>,
  ) {}

  /**
   * Stored results linking the answer and the test case (zero or one in
   * practice), with both back-references loaded.
   */
  async result(answer: Answer, testCase: TestCase): Promise<AnswerTestCaseResult[]> {
    return this.resultRepo.find({
      where: { answerId: answer.id, testCaseId: testCase.id },
      relations: ['answer', 'testCase'],
    });
  }

  async listForAnswer(answerId: string): Promise<AnswerTestCaseResult[]> {
    return this.resultRepo.find({ where: { answerId } });
  }
}
