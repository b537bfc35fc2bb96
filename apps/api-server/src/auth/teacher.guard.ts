import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import { JwtPayload } from './auth.dto';

/**
 * TeacherGuard – Authoring endpoints (exercises, questions, test cases,
 * dependencies) are open to teachers and admins.
 */
@Injectable()
export class TeacherGuard implements CanActivate {
  private readonly logger = new Logger(TeacherGuard.name);

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<{ user?: JwtPayload }>();
    const user = request.user;

    if (!user) {
      throw new ForbiddenException('Access denied');
    }

    if (!user.teacher && !user.admin) {
      this.logger.warn(`Teacher access denied for user ${user.sub}`);
      throw new ForbiddenException('Teacher access required');
    }

    return true;
  }
}
