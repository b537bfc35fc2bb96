import {
  Controller,
  Get,
  Post,
  Param,
  Body,
  UseGuards,
  Request,
  ParseUUIDPipe,
  Version,
  HttpStatus,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { TeacherGuard } from '../auth/teacher.guard';
import { AuthenticatedRequest } from '../auth/auth.dto';
import { QuestionsService } from '../questions/questions.service';
import { CreateQuestionDto } from '../questions/questions.dto';
import { ExercisesService } from './exercises.service';
import { CreateExerciseDto } from './exercises.dto';

/**
 * ExercisesController
 *
 * - GET /exercises/mine – exercises authored by the caller
 * - GET /exercises/:id – exercise with questions
 * - POST /exercises – teachers only
 * - POST /exercises/:id/questions – the exercise author (or an admin)
 */
@Controller('exercises')
@UseGuards(JwtAuthGuard)
export class ExercisesController {
  constructor(
    private readonly exercisesService: ExercisesService,
    private readonly questionsService: QuestionsService,
  ) {}

  @Post()
  @Version('1')
  @UseGuards(TeacherGuard)
  async create(@Body() dto: CreateExerciseDto, @Request() req: AuthenticatedRequest) {
    const exercise = await this.exercisesService.create(req.user.sub, dto);
    return { statusCode: HttpStatus.CREATED, data: exercise };
  }

  @Get('mine')
  @Version('1')
  async listMine(@Request() req: AuthenticatedRequest) {
    const exercises = await this.exercisesService.listByAuthor(req.user.sub);
    return { statusCode: HttpStatus.OK, data: exercises };
  }

  @Get(':id')
  @Version('1')
  async findOne(@Param('id', ParseUUIDPipe) exerciseId: string) {
    const exercise = await this.exercisesService.findOne(exerciseId);
    return { statusCode: HttpStatus.OK, data: exercise };
  }

  @Post(':id/questions')
  @Version('1')
  @UseGuards(TeacherGuard)
  async createQuestion(
    @Param('id', ParseUUIDPipe) exerciseId: string,
    @Body() dto: CreateQuestionDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const exercise = await this.exercisesService.findAuthored(exerciseId, req.user);
    const question = await this.questionsService.create(exercise, dto);
    return { statusCode: HttpStatus.CREATED, data: question };
  }
}
