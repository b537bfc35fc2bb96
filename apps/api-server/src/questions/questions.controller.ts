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
  ForbiddenException,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { TeacherGuard } from '../auth/teacher.guard';
import { AuthenticatedRequest } from '../auth/auth.dto';
import { TeamsService } from '../teams/teams.service';
import { QuestionsService } from './questions.service';
import { QuestionDependenciesService } from './question-dependencies.service';
import { TestCasesService } from './test-cases.service';
import { AnswerabilityService } from './answerability.service';
import { AvailabilityQueryDto, CreateDependencyDto, CreateTestCaseDto } from './questions.dto';

/**
 * QuestionsController
 *
 * - GET /questions/:id/availability?teamId= – dependency status for a team
 * - GET /questions/:id/dependencies – prerequisite edges
 * - POST /questions/:id/dependencies, POST /questions/:id/test-cases – the
 *   author of the question's exercise (or an admin)
 *
 * Expected outputs of test cases are never listed to students.
 */
@Controller('questions')
@UseGuards(JwtAuthGuard)
export class QuestionsController {
  constructor(
    private readonly questionsService: QuestionsService,
    private readonly dependenciesService: QuestionDependenciesService,
    private readonly testCasesService: TestCasesService,
    private readonly answerabilityService: AnswerabilityService,
    private readonly teamsService: TeamsService,
  ) {}

  @Get(':id/availability')
  @Version('1')
  async availability(
    @Param('id', ParseUUIDPipe) questionId: string,
    @Query() query: AvailabilityQueryDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const question = await this.questionsService.findOne(questionId);
    const team = await this.teamsService.findOne(query.teamId);
    if (!this.teamsService.belongsTo(team, req.user.sub)) {
      throw new ForbiddenException('Not a member of this team');
    }

    const availability = await this.answerabilityService.availability(question, team);
    return { statusCode: HttpStatus.OK, data: availability };
  }

  @Get(':id/dependencies')
  @Version('1')
  async listDependencies(@Param('id', ParseUUIDPipe) questionId: string) {
    await this.questionsService.findOne(questionId);
    const dependencies = await this.dependenciesService.listDependencies(questionId);
    return { statusCode: HttpStatus.OK, data: dependencies };
  }

  @Post(':id/dependencies')
  @Version('1')
  @UseGuards(TeacherGuard)
  async addDependency(
    @Param('id', ParseUUIDPipe) questionId: string,
    @Body() dto: CreateDependencyDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const question = await this.questionsService.findAuthored(questionId, req.user);
    const dependency = await this.dependenciesService.addDependency(question, dto);
    return { statusCode: HttpStatus.CREATED, data: dependency };
  }

  @Post(':id/test-cases')
  @Version('1')
  @UseGuards(TeacherGuard)
  async createTestCase(
    @Param('id', ParseUUIDPipe) questionId: string,
    @Body() dto: CreateTestCaseDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const question = await this.questionsService.findAuthored(questionId, req.user);
    const testCase = await this.testCasesService.create(question, dto);
    return { statusCode: HttpStatus.CREATED, data: testCase };
  }
}
