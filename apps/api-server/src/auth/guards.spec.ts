import { ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AdminGuard } from './admin.guard';
import { TeacherGuard } from './teacher.guard';
import { JwtPayload } from './auth.dto';

function contextFor(user?: JwtPayload): ExecutionContextHost {
  return new ExecutionContextHost([{ user }]);
}

const student: JwtPayload = { sub: 'u1', email: 'student@example.com', teacher: false, admin: false };
const teacher: JwtPayload = { ...student, sub: 'u2', teacher: true };
const admin: JwtPayload = { ...student, sub: 'u3', admin: true };

describe('TeacherGuard', () => {
  const guard = new TeacherGuard();

  it('admits teachers and admins', () => {
    expect(guard.canActivate(contextFor(teacher))).toBe(true);
    expect(guard.canActivate(contextFor(admin))).toBe(true);
  });

  it('refuses students', () => {
    expect(() => guard.canActivate(contextFor(student))).toThrow(
      new ForbiddenException('Teacher access required'),
    );
  });

  it('refuses unauthenticated requests', () => {
    expect(() => guard.canActivate(contextFor())).toThrow('Access denied');
  });
});

describe('AdminGuard', () => {
  const guard = new AdminGuard();

  it('admits admins', () => {
    expect(guard.canActivate(contextFor(admin))).toBe(true);
  });

  it('refuses teachers', () => {
    expect(() => guard.canActivate(contextFor(teacher))).toThrow('Admin access required');
  });

  it('refuses unauthenticated requests', () => {
    expect(() => guard.canActivate(contextFor())).toThrow('Access denied');
  });
});
