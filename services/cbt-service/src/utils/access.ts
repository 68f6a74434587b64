import { ForbiddenError } from '@cbt/shared';
import { User } from '../models/user.model';

export function isAdmin(user: User): boolean {
  return user.role === 'admin';
}

/** Teachers and admins can see every student's work. */
export function isStaff(user: User): boolean {
  return user.role === 'teacher' || user.role === 'admin';
}

export function assertSelfOrStaff(ownerId: number, actor: User): void {
  if (actor.id !== ownerId && !isStaff(actor)) {
    throw new ForbiddenError('Not enough permissions');
  }
}

export function assertSelfOrAdmin(ownerId: number, actor: User): void {
  if (actor.id !== ownerId && !isAdmin(actor)) {
    throw new ForbiddenError('Not enough permissions');
  }
}
