import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TeamsModule } from '../teams/teams.module';
import { Answer, Question, QuestionDependency, TestCase } from '../entities';
import { QuestionsController } from './questions.controller';
import { QuestionsService } from './questions.service';
import { QuestionDependenciesService } from './question-dependencies.service';
import { TestCasesService } from './test-cases.service';
import { AnswerabilityService } from './answerability.service';
import { DEPENDENCY_CHECK } from './dependency-check';

@Module({
  imports: [
    TypeOrmModule.forFeature([Question, QuestionDependency, TestCase, Answer]),
    TeamsModule,
  ],
  controllers: [QuestionsController],
  providers: [
    QuestionsService,
    QuestionDependenciesService,
    TestCasesService,
    AnswerabilityService,
    { provide: DEPENDENCY_CHECK, useExisting: QuestionDependenciesService },
  ],
  exports: [QuestionsService, TestCasesService, AnswerabilityService, QuestionDependenciesService],
})
export class QuestionsModule {}
