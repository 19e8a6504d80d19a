import type { Group } from '../groups/group.entity';
import type { User } from '../users/user.entity';

export type UserRef = Pick<User, 'id' | 'pseudo'>;

/**
 * Who a Right is granted to. Exactly one of group or user, by construction.
 */
export type Subject =
  | { readonly kind: 'group'; readonly group: Group }
  | { readonly kind: 'user'; readonly user: UserRef };

export function groupSubject(group: Group): Subject {
  return { kind: 'group', group };
}

export function userSubject(user: UserRef): Subject {
  return { kind: 'user', user };
}

export function subjectId(subject: Subject): string {
  return subject.kind === 'group' ? subject.group.id : subject.user.id;
}

export function subjectEquals(a: Subject, b: Subject): boolean {
  return a.kind === b.kind && subjectId(a) === subjectId(b);
}

/** `group:admins` or `user:alice` */
export function describeSubject(subject: Subject): string {
  return subject.kind === 'group' ? `group:${subject.group.name}` : `user:${subject.user.pseudo}`;
}
