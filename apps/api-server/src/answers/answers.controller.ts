import {
  Controller,
  Get,
  Post,
  Param,
  Body,
  Query,
  UseGuards,
  Request,
  ParseUUIDPipe,
  Version,
  HttpStatus,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AuthenticatedRequest } from '../auth/auth.dto';
import { TeamsService } from '../teams/teams.service';
import { QuestionsService } from '../questions/questions.service';
import { TestCasesService } from '../questions/test-cases.service';
import { AnswersService } from './answers.service';
import { AnswerTestCaseResultsService } from './answer-test-case-results.service';
import { SubmitAnswerDto, TeamAnswersQueryDto } from './answers.dto';

/**
 * AnswersController
 *
 * - POST /questions/:id/answers – submit and judge an answer
 * - GET /questions/:id/answers?teamId= – the team's answers to a question
 * - GET /answers/:id/test-cases/:testCaseId – stored result for one test case
 *
 * Answers are visible to the team, the exercise author and admins.
 */
@Controller()
@UseGuards(JwtAuthGuard)
export class AnswersController {
  constructor(
    private readonly answersService: AnswersService,
    private readonly resultsService: AnswerTestCaseResultsService,
    private readonly questionsService: QuestionsService,
    private readonly testCasesService: TestCasesService,
    private readonly teamsService: TeamsService,
  ) {}

  @Post('questions/:id/answers')
  @Version('1')
  async submit(
    @Param('id', ParseUUIDPipe) questionId: string,
    @Body() dto: SubmitAnswerDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const submission = await this.answersService.submit(questionId, req.user.sub, dto);
    return {
      statusCode: HttpStatus.CREATED,
      data: {
        id: submission.answer.id,
        correct: submission.answer.correct,
        results: submission.results.map((result) => ({
          testCaseId: result.testCaseId,
          correct: result.correct,
        })),
      },
    };
  }

  @Get('questions/:id/answers')
  @Version('1')
  async listForTeam(
    @Param('id', ParseUUIDPipe) questionId: string,
    @Query() query: TeamAnswersQueryDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const question = await this.questionsService.findWithExercise(questionId);
    const team = await this.teamsService.findOne(query.teamId);
    this.answersService.assertReviewer(team, question.exercise, req.user);
    const answers = await this.answersService.listForTeam(questionId, team.id);
    return { statusCode: HttpStatus.OK, data: answers };
  }

  @Get('answers/:id/test-cases/:testCaseId')
  @Version('1')
  async result(
    @Param('id', ParseUUIDPipe) answerId: string,
    @Param('testCaseId', ParseUUIDPipe) testCaseId: string,
    @Request() req: AuthenticatedRequest,
  ) {
    const answer = await this.answersService.findOne(answerId);
    this.answersService.assertReviewer(answer.team, answer.question.exercise, req.user);
    const testCase = await this.testCasesService.findOne(testCaseId);
    const results = await this.resultsService.result(answer, testCase);
    return {
      statusCode: HttpStatus.OK,
      data: results.map((result) => ({
        id: result.id,
        answerId: result.answerId,
        testCaseId: result.testCaseId,
        output: result.output,
        correct: result.correct,
      })),
    };
  }
}
