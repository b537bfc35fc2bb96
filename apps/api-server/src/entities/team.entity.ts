import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  ManyToMany,
  JoinColumn,
  JoinTable,
  CreateDateColumn,
} from 'typeorm';
import { IsNotEmpty, MaxLength } from 'class-validator';
import { User } from './user.entity';
import { Exercise } from './exercise.entity';

/**
 * Team Entity – Group of users working through a set of exercises.
 *
 * A team has exactly one owner (the creator). The owner manages members
 * and assigned exercises but is not implicitly a member.
 * Membership and exercise assignment are plain join tables so that the
 * store enforces referential integrity on both sides.
 */
@Entity('teams')
export class Team {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @IsNotEmpty({ message: "can't be blank" })
  @MaxLength(255)
  @Column({ length: 255 })
  name!: string;

  @Index()
  @ManyToOne(() => User, (user) => user.teamsCreated, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'ownerId' })
  owner!: User;

  @Column({ type: 'uuid' })
  ownerId!: string;

  @ManyToMany(() => User, (user) => user.teams)
  @JoinTable({
    name: 'teams_users',
    joinColumn: { name: 'teamId' },
    inverseJoinColumn: { name: 'userId' },
  })
  members!: User[];

  @ManyToMany(() => Exercise, (exercise) => exercise.teams)
  @JoinTable({
    name: 'exercises_teams',
    joinColumn: { name: 'teamId' },
    inverseJoinColumn: { name: 'exerciseId' },
  })
  exercises!: Exercise[];

  @CreateDateColumn()
  readonly createdAt!: Date;
}
