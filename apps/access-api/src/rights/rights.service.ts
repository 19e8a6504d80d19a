import { BadRequestException, ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { GROUP_STORE, type GroupStore } from '../groups/group.store';
import { JsonLogger } from '../logging/json-logger.service';
import type { User } from '../users/user.entity';
import { USER_STORE, type UserStore } from '../users/user.store';
import { describeResource, resource, specificResource, type AnyResource } from './resource';
import type { RestMethod } from './rest-method.enum';
import type { Right } from './right.entity';
import { RightAlreadyGrantedError } from './rights.errors';
import { RIGHTS_STORE, type RightsStore } from './rights.store';
import { describeSubject, groupSubject, userSubject, type Subject } from './subject';

export interface GrantParams {
  groupId?: string;
  userId?: string;
  resourceName: string;
  instanceId?: string;
  method: RestMethod;
}

/**
 * RightsService - grants, revokes and evaluates Rights.
 *
 * Evaluation is default-deny: access is granted only when some Right exists for
 * the user or one of the user's groups, on the requested resource (or, for a
 * specific instance, on its resource class) with the requested method.
 */
@Injectable()
export class RightsService {
  constructor(
    @Inject(RIGHTS_STORE) private readonly rights: RightsStore,
    @Inject(GROUP_STORE) private readonly groups: GroupStore,
    @Inject(USER_STORE) private readonly users: UserStore,
    private readonly logger: JsonLogger
  ) {}

  list(): Promise<Right[]> {
    return this.rights.findAll();
  }

  async getById(id: string): Promise<Right> {
    const right = await this.rights.findById(id);
    if (!right) throw new NotFoundException('Right not found');
    return right;
  }

  /**
   * @returns the single matching Right, undefined when none
   * @throws DuplicateGrantError when the store holds more than one
   */
  find(subject: Subject, target: AnyResource, method: RestMethod): Promise<Right | undefined> {
    return this.rights.find(subject, target, method);
  }

  async grant(params: GrantParams): Promise<Right> {
    const subject = await this.resolveSubject(params);
    const target =
      params.instanceId !== undefined
        ? specificResource(params.resourceName, params.instanceId)
        : resource(params.resourceName);

    const existing = await this.rights.find(subject, target, params.method);
    if (existing) throw new ConflictException('Right already granted');

    // Concurrent identical grants can both pass the lookup; the store rejects the second.
    let right: Right;
    try {
      right = await this.rights.save({ id: randomUUID(), subject, resource: target, method: params.method });
    } catch (error) {
      if (error instanceof RightAlreadyGrantedError) throw new ConflictException('Right already granted');
      throw error;
    }
    this.logger.log('Right granted', {
      rightId: right.id,
      subject: describeSubject(subject),
      resource: describeResource(target),
      method: right.method
    });
    return right;
  }

  async revoke(id: string): Promise<void> {
    const removed = await this.rights.remove(id);
    if (!removed) throw new NotFoundException('Right not found');
    this.logger.log('Right revoked', { rightId: id });
  }

  /** @returns number of rights removed */
  async revokeAllFor(subject: Subject): Promise<number> {
    const held = await this.rights.findBySubject(subject);
    for (const right of held) {
      await this.rights.remove(right.id);
    }
    if (held.length > 0) {
      this.logger.log('Rights revoked for subject', { subject: describeSubject(subject), count: held.length });
    }
    return held.length;
  }

  async isGranted(user: User, target: AnyResource, method: RestMethod): Promise<boolean> {
    const subjects: Subject[] = [userSubject(user)];
    for (const groupId of user.groupIds) {
      const group = await this.groups.findById(groupId);
      if (group) {
        subjects.push(groupSubject(group));
      } else {
        this.logger.warn('User references a missing group', { userId: user.id, groupId });
      }
    }

    const targets: AnyResource[] = target.kind === 'specific' ? [target, resource(target.name)] : [target];

    for (const subject of subjects) {
      for (const candidate of targets) {
        const right = await this.rights.find(subject, candidate, method);
        if (right) {
          this.logger.debug('Access granted', {
            rightId: right.id,
            subject: describeSubject(subject),
            resource: describeResource(candidate),
            method
          });
          return true;
        }
      }
    }

    return false;
  }

  private async resolveSubject(params: GrantParams): Promise<Subject> {
    const hasGroup = params.groupId !== undefined;
    const hasUser = params.userId !== undefined;
    if (hasGroup === hasUser) {
      throw new BadRequestException('Exactly one of groupId or userId is required');
    }

    if (params.groupId !== undefined) {
      const group = await this.groups.findById(params.groupId);
      if (!group) throw new NotFoundException('Group not found');
      return groupSubject(group);
    }

    const user = params.userId !== undefined ? await this.users.findById(params.userId) : undefined;
    if (!user) throw new NotFoundException('User not found');
    return userSubject(user);
  }
}
