/**
 * Entity barrel export – Single import point for all TypeORM entities.
 *
 * Keep this file in sync when adding new entities: AllEntities feeds both
 * TypeOrmModule.forRootAsync() and the in-memory test data source.
 */
export { User } from './user.entity';
export { Team } from './team.entity';
export { Exercise } from './exercise.entity';
export { Question } from './question.entity';
export { QuestionDependency } from './question-dependency.entity';
export type { DependencyOperator } from './question-dependency.entity';
export { TestCase } from './test-case.entity';
export { Answer } from './answer.entity';
export { AnswerTestCaseResult } from './answer-test-case-result.entity';

import { User } from './user.entity';
import { Team } from './team.entity';
import { Exercise } from './exercise.entity';
import { Question } from './question.entity';
import { QuestionDependency } from './question-dependency.entity';
import { TestCase } from './test-case.entity';
import { Answer } from './answer.entity';
import { AnswerTestCaseResult } from './answer-test-case-result.entity';

export const AllEntities = [
  User,
  Team,
  Exercise,
  Question,
  QuestionDependency,
  TestCase,
  Answer,
  AnswerTestCaseResult,
];
