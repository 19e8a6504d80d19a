import type { EntityStore } from '../storage/entity-store';
import type { AnyResource } from './resource';
import type { RestMethod } from './rest-method.enum';
import type { Right } from './right.entity';
import type { Subject } from './subject';

export const RIGHTS_STORE = 'access:rightsStore';

export interface RightsStore extends EntityStore<Right> {
  /**
   * The single Right granting `method` on `resource` to `subject`, or undefined.
   * @throws DuplicateGrantError when more than one Right matches
   */
  find(subject: Subject, resource: AnyResource, method: RestMethod): Promise<Right | undefined>;

  findBySubject(subject: Subject): Promise<Right[]>;
}
