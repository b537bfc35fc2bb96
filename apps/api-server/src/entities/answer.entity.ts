import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
} from 'typeorm';
import { Question } from './question.entity';
import { User } from './user.entity';
import { Team } from './team.entity';
import { AnswerTestCaseResult } from './answer-test-case-result.entity';

/**
 * Answer Entity – A user's submission to a question, on behalf of a team.
 *
 * Append-only: answers are never updated after judging.
 * `correct` is server-computed from the test-case results, never
 * client-provided.
 *
 * Performance: composite index on (questionId, teamId, correct) serves the
 * dependency evaluator, which asks "has this team solved that question?".
 */
@Entity('answers')
@Index(['questionId', 'teamId', 'correct'])
export class Answer {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @ManyToOne(() => Question, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'questionId' })
  question!: Question;

  @Column({ type: 'uuid' })
  questionId!: string;

  /** Deleting a user goes through team cascades; mssql allows one path */
  @Index()
  @ManyToOne(() => User, (user) => user.answers, { onDelete: 'NO ACTION' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Column({ type: 'uuid' })
  userId!: string;

  @ManyToOne(() => Team, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'teamId' })
  team!: Team;

  @Column({ type: 'uuid' })
  teamId!: string;

  /** Submitted source or free-text answer */
  @Column({ type: 'text' })
  content!: string;

  @Column({ default: false })
  correct!: boolean;

  @OneToMany(() => AnswerTestCaseResult, (result) => result.answer)
  testCaseResults!: AnswerTestCaseResult[];

  @CreateDateColumn()
  readonly createdAt!: Date;
}
