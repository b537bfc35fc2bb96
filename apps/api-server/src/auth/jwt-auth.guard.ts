import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * JwtAuthGuard – Standard NestJS guard wrapping the 'jwt' Passport strategy.
 *
 * Apply via @UseGuards(JwtAuthGuard) to require a valid, non-expired JWT.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
