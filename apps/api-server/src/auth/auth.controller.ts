import { Controller, Post, Body, HttpCode, HttpStatus, Version } from '@nestjs/common';
import { AuthService } from './auth.service';
import { RegisterDto, LoginDto, RefreshTokenDto } from './auth.dto';

/**
 * AuthController – Public endpoints for obtaining tokens.
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  @Version('1')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto) {
    const tokens = await this.authService.register(dto);
    return {
      statusCode: HttpStatus.CREATED,
      message: 'Registration successful',
      data: tokens,
    };
  }

  @Post('login')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto) {
    const tokens = await this.authService.login(dto);
    return {
      statusCode: HttpStatus.OK,
      message: 'Login successful',
      data: tokens,
    };
  }

  /** The old refresh token is invalidated immediately. */
  @Post('refresh')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshTokenDto) {
    const tokens = await this.authService.refreshTokens(dto.refreshToken);
    return {
      statusCode: HttpStatus.OK,
      message: 'Tokens refreshed',
      data: tokens,
    };
  }
}
