import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  ManyToMany,
} from 'typeorm';
import { randomUUID } from 'crypto';
import { IsBoolean, IsNotEmpty, Matches, ValidateIf } from 'class-validator';
import { Team } from './team.entity';
import { Exercise } from './exercise.entity';
import { Answer } from './answer.entity';

/**
 * Local part of word characters, `+`, `-` and `.`; domain labels of
 * letters, digits and `-` separated by single dots; alphabetic TLD.
 */
export const VALID_EMAIL_REGEX = /^[\w+\-.]+@[a-z\d-]+(\.[a-z\d-]+)*\.[a-z]+$/i;

/**
 * User Entity – Account record for students, teachers and admins.
 *
 * Design decisions:
 * - Email is indexed with a unique constraint; the application check in
 *   UsersService reports the conflict as a field error before the index does.
 * - `anonymousId` identifies the user in shared rankings without exposing
 *   the name or email. It is generated once, before the first validation,
 *   and never regenerated.
 * - `password` is transient: only the bcrypt hash is persisted.
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  readonly id!: string;

  @IsNotEmpty({ message: "can't be blank" })
  @Column({ length: 255 })
  name!: string;

  @Index({ unique: true })
  @IsNotEmpty({ message: "can't be blank" })
  @Matches(VALID_EMAIL_REGEX, { message: 'is invalid' })
  @Column({ length: 255, unique: true })
  email!: string;

  /** Plaintext password, present only between assignment and save */
  @ValidateIf((user: User) => !user.passwordHash)
  @IsNotEmpty({ message: "can't be blank" })
  password?: string;

  @Column({ type: 'varchar', length: 255 })
  passwordHash!: string;

  @IsBoolean({ message: "can't be blank" })
  @Column()
  teacher!: boolean;

  @IsBoolean({ message: "can't be blank" })
  @Column()
  admin!: boolean;

  @Index({ unique: true })
  @IsNotEmpty({ message: "can't be blank" })
  @Column({ type: 'varchar', length: 64 })
  anonymousId!: string;

  /** Hashed refresh token for rotation-based JWT refresh flow */
  @Column({ type: 'varchar', length: 255, nullable: true })
  refreshTokenHash!: string | null;

  @OneToMany(() => Team, (team) => team.owner)
  teamsCreated!: Team[];

  @ManyToMany(() => Team, (team) => team.members)
  teams!: Team[];

  @OneToMany(() => Exercise, (exercise) => exercise.author)
  exercises!: Exercise[];

  @OneToMany(() => Answer, (answer) => answer.user)
  answers!: Answer[];

  @CreateDateColumn()
  readonly createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  isOwner(team: Team): boolean {
    return team.ownerId === this.id;
  }

  /** Fills `anonymousId` when blank; a set value is kept. */
  generateAnonymousId(): void {
    if (!this.anonymousId) {
      this.anonymousId = randomUUID();
    }
  }
}
