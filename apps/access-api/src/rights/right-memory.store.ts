import { MemoryStore } from '../storage/memory-store';
import { resourceEquals, type AnyResource } from './resource';
import type { RestMethod } from './rest-method.enum';
import type { Right } from './right.entity';
import { DuplicateGrantError, RightAlreadyGrantedError } from './rights.errors';
import type { RightsStore } from './rights.store';
import { subjectEquals, type Subject } from './subject';

export class RightMemoryStore extends MemoryStore<Right> implements RightsStore {
  async find(subject: Subject, resource: AnyResource, method: RestMethod): Promise<Right | undefined> {
    const matches = (await this.findBySubject(subject)).filter(
      (r) => resourceEquals(r.resource, resource) && r.method === method
    );

    if (matches.length > 1) {
      throw new DuplicateGrantError(subject, resource, method, matches.length);
    }
    return matches[0];
  }

  /** Checks and inserts without yielding, so concurrent saves of one triple cannot both land. */
  async save(right: Right): Promise<Right> {
    const clash = Array.from(this.entities.values()).some(
      (r) =>
        r.id !== right.id &&
        subjectEquals(r.subject, right.subject) &&
        resourceEquals(r.resource, right.resource) &&
        r.method === right.method
    );
    if (clash) throw new RightAlreadyGrantedError(right.subject, right.resource, right.method);

    this.entities.set(right.id, right);
    return right;
  }

  async findBySubject(subject: Subject): Promise<Right[]> {
    return Array.from(this.entities.values()).filter((r) => subjectEquals(r.subject, subject));
  }
}
