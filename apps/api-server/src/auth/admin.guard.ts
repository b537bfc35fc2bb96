import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import { JwtPayload } from './auth.dto';

/**
 * AdminGuard – Restricts access to administrative endpoints.
 *
 * Secondary check on top of JwtAuthGuard: reads the payload that guard
 * attached to `request.user` and requires the `admin` claim.
 */
@Injectable()
export class AdminGuard implements CanActivate {
  private readonly logger = new Logger(AdminGuard.name);

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<{ user?: JwtPayload }>();
    const user = request.user;

    if (!user) {
      throw new ForbiddenException('Access denied');
    }

    if (!user.admin) {
      this.logger.warn(`Admin access denied for user ${user.sub}`);
      throw new ForbiddenException('Admin access required');
    }

    return true;
  }
}
