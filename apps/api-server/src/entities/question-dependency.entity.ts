import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { Question } from './question.entity';

export const DEPENDENCY_OPERATORS = ['OR', 'AND'] as const;

export type DependencyOperator = (typeof DEPENDENCY_OPERATORS)[number];

/**
 * QuestionDependency Entity – Directed edge "question1 depends on question2".
 *
 * Edges of the same dependent question and operator are evaluated as a
 * group: any OR prerequisite unlocks the question, every AND prerequisite
 * must be completed. The unique constraint prevents duplicate edges.
 */
@Entity('question_dependencies')
@Unique(['question1Id', 'question2Id'])
export class QuestionDependency {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @Index()
  @ManyToOne(() => Question, (question) => question.dependencies, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'question1Id' })
  question1!: Question;

  @Column({ type: 'uuid' })
  question1Id!: string;

  /** No cascade here: a second cascade path to the same table is rejected by mssql */
  @ManyToOne(() => Question, { onDelete: 'NO ACTION' })
  @JoinColumn({ name: 'question2Id' })
  question2!: Question;

  @Column({ type: 'uuid' })
  question2Id!: string;

  @Column({ type: 'varchar', length: 3 })
  operator!: DependencyOperator;
}
