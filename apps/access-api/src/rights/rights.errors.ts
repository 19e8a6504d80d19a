import { DomainError, ERROR_CODES } from '../common/http/error-codes';
import { describeResource, type AnyResource } from './resource';
import type { RestMethod } from './rest-method.enum';
import { describeSubject, type Subject } from './subject';

/**
 * More than one Right matches a subject/resource/method triple.
 * The store never picks one of them.
 */
export class DuplicateGrantError extends DomainError {
  readonly code = ERROR_CODES.DUPLICATE_GRANT;

  constructor(
    readonly subject: Subject,
    readonly resource: AnyResource,
    readonly method: RestMethod,
    readonly matches: number
  ) {
    super(
      `${matches} rights grant ${method} on ${describeResource(resource)} to ${describeSubject(subject)}; expected at most one`
    );
  }
}

/** A stored Right is unusable: both or neither subject set, dangling subject, unknown method. */
export class RightIntegrityError extends DomainError {
  readonly code = ERROR_CODES.RIGHT_INTEGRITY;

  constructor(readonly rightId: string, reason: string) {
    super(`Right ${rightId} is malformed: ${reason}`);
  }
}

/** The store already holds a Right for this subject/resource/method triple. */
export class RightAlreadyGrantedError extends DomainError {
  readonly code = ERROR_CODES.RIGHT_EXISTS;

  constructor(
    readonly subject: Subject,
    readonly resource: AnyResource,
    readonly method: RestMethod
  ) {
    super(`${method} on ${describeResource(resource)} is already granted to ${describeSubject(subject)}`);
  }
}
