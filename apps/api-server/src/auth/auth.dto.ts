import { IsEmail, IsString, MaxLength, MinLength } from 'class-validator';

/**
 * DTOs for the Auth module – validated by the global ValidationPipe before
 * they reach the service layer.
 */

export class RegisterDto {
  @IsString()
  @MaxLength(255)
  name!: string;

  @IsEmail()
  email!: string;

  @IsString()
  @MinLength(8)
  password!: string;
}

export class LoginDto {
  @IsEmail()
  email!: string;

  @IsString()
  password!: string;
}

export class RefreshTokenDto {
  @IsString()
  refreshToken!: string;
}

/**
 * JWT payload shape – carried inside every access token.
 */
export interface JwtPayload {
  sub: string; // userId
  email: string;
  teacher: boolean;
  admin: boolean;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/** Request after JwtAuthGuard has attached the payload */
export interface AuthenticatedRequest {
  user: JwtPayload;
}
