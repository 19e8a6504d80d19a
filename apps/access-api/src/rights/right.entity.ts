import type { AnyResource } from './resource';
import type { RestMethod } from './rest-method.enum';
import type { Subject } from './subject';

/** Grant of `method` on `resource` to `subject`. Absence of a Right means deny. */
export interface Right {
  readonly id: string;
  readonly subject: Subject;
  readonly resource: AnyResource;
  readonly method: RestMethod;
}
