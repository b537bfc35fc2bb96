import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  ManyToMany,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
} from 'typeorm';
import { IsNotEmpty, MaxLength } from 'class-validator';
import { User } from './user.entity';
import { Team } from './team.entity';
import { Question } from './question.entity';

/**
 * Exercise Entity – A set of questions authored by a teacher and assigned
 * to teams.
 */
@Entity('exercises')
export class Exercise {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @IsNotEmpty({ message: "can't be blank" })
  @MaxLength(255)
  @Column({ length: 255 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Index()
  @ManyToOne(() => User, (user) => user.exercises, { onDelete: 'NO ACTION' })
  @JoinColumn({ name: 'authorId' })
  author!: User;

  @Column({ type: 'uuid' })
  authorId!: string;

  @OneToMany(() => Question, (question) => question.exercise)
  questions!: Question[];

  @ManyToMany(() => Team, (team) => team.exercises)
  teams!: Team[];

  @CreateDateColumn()
  readonly createdAt!: Date;

  isAuthor(userId: string): boolean {
    return this.authorId === userId;
  }
}
