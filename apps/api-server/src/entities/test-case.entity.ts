import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
} from 'typeorm';
import { IsNotEmpty } from 'class-validator';
import { Question } from './question.entity';

/**
 * TestCase Entity – Input fed to an answer and the output it must produce.
 */
@Entity('test_cases')
export class TestCase {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @Index()
  @ManyToOne(() => Question, (question) => question.testCases, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'questionId' })
  question!: Question;

  @Column({ type: 'uuid' })
  questionId!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  title!: string | null;

  @Column({ type: 'text', default: '' })
  input!: string;

  /** Expected output */
  @IsNotEmpty({ message: "can't be blank" })
  @Column({ type: 'text' })
  output!: string;

  @CreateDateColumn()
  readonly createdAt!: Date;
}
