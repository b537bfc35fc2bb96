import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Answer, AnswerTestCaseResult } from '../entities';
import { QuestionsModule } from '../questions/questions.module';
import { TeamsModule } from '../teams/teams.module';
import { AnswersController } from './answers.controller';
import { AnswersService } from './answers.service';
import { AnswerTestCaseResultsService } from './answer-test-case-results.service';

@Module({
  imports: [TypeOrmModule.forFeature([Answer, AnswerTestCaseResult]), QuestionsModule, TeamsModule],
  controllers: [AnswersController],
  providers: [AnswersService, AnswerTestCaseResultsService],
  exports: [AnswersService, AnswerTestCaseResultsService],
})
export class AnswersModule {}
