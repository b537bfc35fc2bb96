import {
  Injectable,
  BadRequestException,
  ForbiddenException,
  NotFoundException,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Answer, AnswerTestCaseResult, Exercise, Team, TestCase } from '../entities';
import { JwtPayload } from '../auth/auth.dto';
import {
  ValidationErrors,
  ValidationFailedException,
  addError,
  hasErrors,
  validateEntity,
} from '../common/validation';
import { QuestionsService } from '../questions/questions.service';
import { TestCasesService } from '../questions/test-cases.service';
import { AnswerabilityService } from '../questions/answerability.service';
import { TeamsService } from '../teams/teams.service';
import { SubmitAnswerDto } from './answers.dto';
import { outputsMatch } from './output-judge';

export interface Submission {
  answer: Answer;
  results: AnswerTestCaseResult[];
}

/**
 * AnswersService – Records and judges answers.
 *
 * Flow:
 * 1. Load question and team; the user must belong to the team and the
 *    question's exercise must be assigned to it
 * 2. Refuse while the question's dependencies are not completed
 * 3. Judge each submitted output against the test case's expected output
 * 4. The answer is correct when every test case of the question passed
 * 5. Answer and results are written in one transaction
 *
 * `correct` is server-computed; the submitted outputs are the only input.
 */
@Injectable()
export class AnswersService {
  private readonly logger = new Logger(AnswersService.name);

  constructor(
    @InjectRepository(Answer) private readonly answerRepo: Repository<Answer>,
    @InjectRepository(AnswerTestCaseResult)
    private readonly resultRepo: Repository<AnswerTestCaseResult>,
    private readonly questionsService: QuestionsService,
    private readonly testCasesService: TestCasesService,
    private readonly answerabilityService: AnswerabilityService,
    private readonly teamsService: TeamsService,
  ) {}

  /**
   * @throws ForbiddenException when the user may not answer for the team
   * @throws BadRequestException when a result names a foreign or repeated test case
   * @throws ValidationFailedException with `results.<index>.output` violations
   */
  async submit(questionId: string, userId: string, dto: SubmitAnswerDto): Promise<Submission> {
    const question = await this.questionsService.findOne(questionId);
    const team = await this.teamsService.findOne(dto.teamId);

    if (!this.teamsService.belongsTo(team, userId)) {
      throw new ForbiddenException('Not a member of this team');
    }
    if (!this.teamsService.hasExercise(team, question.exerciseId)) {
      throw new ForbiddenException('Exercise is not assigned to this team');
    }
    if (!(await this.answerabilityService.ableToAnswer(question, team))) {
      this.logger.warn(`Locked question answered: question=${question.id} team=${team.id}`);
      throw new ForbiddenException('Question dependencies not completed');
    }

    const testCases = await this.testCasesService.listForQuestion(question.id);
    const testCasesById = new Map(testCases.map((testCase) => [testCase.id, testCase]));

    const results: AnswerTestCaseResult[] = [];
    const errors: ValidationErrors = {};
    for (const [index, submitted] of dto.results.entries()) {
      const testCase = testCasesById.get(submitted.testCaseId);
      if (!testCase) {
        throw new BadRequestException(`Test case ${submitted.testCaseId} does not belong to this question`);
      }
      if (results.some((result) => result.testCaseId === testCase.id)) {
        throw new BadRequestException(`Test case ${testCase.id} submitted more than once`);
      }

      const result = this.judge(testCase, submitted.output);
      const violations = await validateEntity(result);
      for (const [field, messages] of Object.entries(violations)) {
        messages.forEach((message) => addError(errors, `results.${index}.${field}`, message));
      }
      results.push(result);
    }

    if (hasErrors(errors)) {
      throw new ValidationFailedException(errors);
    }

    const passed = new Set(results.filter((result) => result.correct).map((result) => result.testCaseId));
    const answer = this.answerRepo.create({
      questionId: question.id,
      userId,
      teamId: team.id,
      content: dto.content,
      correct: testCases.every((testCase) => passed.has(testCase.id)),
    });

    const submission = await this.answerRepo.manager.transaction(async (manager) => {
      const savedAnswer = await manager.save(answer);
      results.forEach((result) => {
        result.answerId = savedAnswer.id;
      });
      const savedResults = await manager.save(results);
      return { answer: savedAnswer, results: savedResults };
    });

    this.logger.log(
      `Answer judged: answer=${submission.answer.id} question=${question.id} team=${team.id} ` +
        `passed=${passed.size}/${testCases.length} correct=${submission.answer.correct}`,
    );
    return submission;
  }

  async findOne(answerId: string): Promise<Answer> {
    const answer = await this.answerRepo.findOne({
      where: { id: answerId },
      relations: ['team', 'team.members', 'question', 'question.exercise'],
    });
    if (!answer) throw new NotFoundException('Answer not found');
    return answer;
  }

  /**
   * Team members, the author of the exercise and admins may read a team's
   * answers; `team.members` must be loaded.
   */
  assertReviewer(team: Team, exercise: Exercise, actor: JwtPayload): void {
    if (this.teamsService.belongsTo(team, actor.sub) || exercise.isAuthor(actor.sub) || actor.admin) {
      return;
    }
    this.logger.warn(`User ${actor.sub} tried to read answers of team ${team.id}`);
    throw new ForbiddenException('Not a member of this team');
  }

  async listForTeam(questionId: string, teamId: string): Promise<Answer[]> {
    return this.answerRepo.find({
      where: { questionId, teamId },
      order: { createdAt: 'DESC' },
    });
  }

  private judge(testCase: TestCase, output: string): AnswerTestCaseResult {
    return this.resultRepo.create({
      testCaseId: testCase.id,
      output,
      correct: output.length > 0 && outputsMatch(output, testCase.output),
    });
  }
}
