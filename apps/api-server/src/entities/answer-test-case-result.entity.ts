import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { IsNotEmpty } from 'class-validator';
import { Answer } from './answer.entity';
import { TestCase } from './test-case.entity';

/**
 * AnswerTestCaseResult Entity – Output an answer produced for one test case
 * and whether it matched the expected output.
 */
@Entity('answer_test_case_results')
@Unique(['answerId', 'testCaseId'])
export class AnswerTestCaseResult {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @Index()
  @ManyToOne(() => Answer, (answer) => answer.testCaseResults, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'answerId' })
  answer!: Answer;

  @Column({ type: 'uuid' })
  answerId!: string;

  @ManyToOne(() => TestCase, { onDelete: 'NO ACTION' })
  @JoinColumn({ name: 'testCaseId' })
  testCase!: TestCase;

  @Column({ type: 'uuid' })
  testCaseId!: string;

  @IsNotEmpty({ message: "can't be blank" })
  @Column({ type: 'text' })
  output!: string;

  @Column({ default: false })
  correct!: boolean;
}
