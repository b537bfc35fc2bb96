import {
  Injectable,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { createHash, randomUUID, timingSafeEqual } from 'crypto';
import { User } from '../entities';
import { UsersService } from '../users/users.service';
import { ValidationFailedException } from '../common/validation';
import { JwtPayload, RegisterDto, LoginDto, TokenPair } from './auth.dto';

/**
 * AuthService – Handles registration, login, and JWT refresh token rotation.
 *
 * - Registration goes through UsersService.save so the same validation
 *   lifecycle (anonymous id, email grammar and uniqueness) applies to every
 *   account. Registration always creates a student; admins grant the
 *   teacher role through UsersService.setTeacher.
 * - Refresh token rotation: on each /refresh call the old refresh token is
 *   invalidated and a new pair is issued; a reused token revokes the session.
 * - Passwords are hashed with bcrypt by UsersService.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
  ) {}

  /**
   * @throws ValidationFailedException with the field-keyed violations
   */
  async register(dto: RegisterDto): Promise<TokenPair> {
    const user = new User();
    user.name = dto.name;
    user.email = dto.email;
    user.password = dto.password;
    user.teacher = false;
    user.admin = false;

    const result = await this.usersService.save(user);
    if (!result.saved) {
      throw new ValidationFailedException(result.errors);
    }

    const tokens = await this.generateTokens(result.user);
    await this.storeRefreshToken(result.user.id, tokens.refreshToken);

    this.logger.log(`User registered: ${result.user.email}`);
    return tokens;
  }

  /**
   * @throws UnauthorizedException on invalid credentials
   */
  async login(dto: LoginDto): Promise<TokenPair> {
    const user = await this.usersService.findByEmail(dto.email);
    if (!user) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const isPasswordValid = await bcrypt.compare(dto.password, user.passwordHash);
    if (!isPasswordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const tokens = await this.generateTokens(user);
    await this.storeRefreshToken(user.id, tokens.refreshToken);

    this.logger.log(`User logged in: ${user.email}`);
    return tokens;
  }

  async refreshTokens(refreshToken: string): Promise<TokenPair> {
    let payload: JwtPayload;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(refreshToken, {
        secret: this.config.get<string>('JWT_REFRESH_SECRET'),
      });
    } catch (error) {
      this.logger.warn(`Token refresh failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new UnauthorizedException('Invalid refresh token');
    }

    const user = await this.usersService.findByEmail(payload.email);
    if (!user || user.id !== payload.sub || !user.refreshTokenHash) {
      throw new UnauthorizedException('Invalid refresh token');
    }

    if (!this.matchesStoredToken(refreshToken, user.refreshTokenHash)) {
      this.logger.warn(`Refresh token reuse detected for user ${user.id}`);
      await this.usersService.updateRefreshTokenHash(user.id, null);
      throw new UnauthorizedException('Refresh token has been revoked');
    }

    const tokens = await this.generateTokens(user);
    await this.storeRefreshToken(user.id, tokens.refreshToken);
    return tokens;
  }

  /**
   * Access token is short-lived (15min), refresh token is long-lived (7d).
   */
  private async generateTokens(user: User): Promise<TokenPair> {
    const payload: JwtPayload = {
      sub: user.id,
      email: user.email,
      teacher: user.teacher,
      admin: user.admin,
    };

    const [accessToken, refreshToken] = await Promise.all([
      this.jwtService.signAsync(payload, {
        secret: this.config.get<string>('JWT_SECRET'),
        expiresIn: this.config.get<string>('JWT_EXPIRATION', '15m'),
        jwtid: randomUUID(),
      }),
      this.jwtService.signAsync(payload, {
        secret: this.config.get<string>('JWT_REFRESH_SECRET'),
        expiresIn: this.config.get<string>('JWT_REFRESH_EXPIRATION', '7d'),
        jwtid: randomUUID(),
      }),
    ]);

    return { accessToken, refreshToken };
  }

  /**
   * Only a digest is stored, so a leaked table yields no usable tokens.
   * SHA-256 rather than bcrypt: bcrypt reads 72 bytes, and refresh tokens of
   * one user share a longer prefix.
   */
  private async storeRefreshToken(userId: string, refreshToken: string): Promise<void> {
    await this.usersService.updateRefreshTokenHash(userId, this.digest(refreshToken));
  }

  private matchesStoredToken(refreshToken: string, storedHash: string): boolean {
    const actual = Buffer.from(this.digest(refreshToken), 'hex');
    const expected = Buffer.from(storedHash, 'hex');
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }

  private digest(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }
}
