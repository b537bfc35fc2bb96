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
import { IsInt, IsNotEmpty, Min } from 'class-validator';
import { Exercise } from './exercise.entity';
import { TestCase } from './test-case.entity';
import { QuestionDependency } from './question-dependency.entity';

/**
 * Question Entity – A single gradable task inside an exercise.
 *
 * `dependencies` holds the edges where this question is the dependent
 * node; their prerequisites gate whether a team may answer it.
 */
@Entity('questions')
export class Question {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @Index()
  @ManyToOne(() => Exercise, (exercise) => exercise.questions, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'exerciseId' })
  exercise!: Exercise;

  @Column({ type: 'uuid' })
  exerciseId!: string;

  @IsNotEmpty({ message: "can't be blank" })
  @Column({ length: 255 })
  title!: string;

  /** Markdown statement shown to students */
  @IsNotEmpty({ message: "can't be blank" })
  @Column({ type: 'text' })
  description!: string;

  /** Points awarded for a correct answer */
  @IsInt()
  @Min(0)
  @Column({ type: 'int', default: 10 })
  score!: number;

  @Column({ type: 'int', default: 0 })
  sortOrder!: number;

  @OneToMany(() => TestCase, (testCase) => testCase.question)
  testCases!: TestCase[];

  @OneToMany(() => QuestionDependency, (dependency) => dependency.question1)
  dependencies!: QuestionDependency[];

  @CreateDateColumn()
  readonly createdAt!: Date;
}
