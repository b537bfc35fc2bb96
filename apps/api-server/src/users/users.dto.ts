import { IsBoolean } from 'class-validator';
import { User } from '../entities';

/** Public shape of a user – hashes never leave the server */
export interface UserProfileDto {
  id: string;
  name: string;
  email: string;
  anonymousId: string;
  teacher: boolean;
  admin: boolean;
  createdAt: Date;
}

export function toUserProfile(user: User): UserProfileDto {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    anonymousId: user.anonymousId,
    teacher: user.teacher,
    admin: user.admin,
    createdAt: user.createdAt,
  };
}

export class UpdateTeacherRoleDto {
  @IsBoolean()
  teacher!: boolean;
}
