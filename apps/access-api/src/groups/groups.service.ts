import { BadRequestException, ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { JsonLogger } from '../logging/json-logger.service';
import { RightsService } from '../rights/rights.service';
import { groupSubject } from '../rights/subject';
import type { Group } from './group.entity';
import { GROUP_STORE, type GroupStore } from './group.store';

/**
 * GroupsService - CRUD over security groups.
 * Deleting a group also revokes every right held by it.
 */
@Injectable()
export class GroupsService {
  constructor(
    @Inject(GROUP_STORE) private readonly groups: GroupStore,
    private readonly rights: RightsService,
    private readonly logger: JsonLogger
  ) {}

  list(): Promise<Group[]> {
    return this.groups.findAll();
  }

  async getById(id: string): Promise<Group> {
    const group = await this.groups.findById(id);
    if (!group) throw new NotFoundException('Group not found');
    return group;
  }

  async create(name: string): Promise<Group> {
    const trimmed = name.trim();
    if (trimmed.length === 0) throw new BadRequestException('Group name must not be blank');
    if (await this.groups.findByName(trimmed)) {
      throw new ConflictException('Group name already exists');
    }

    const group = await this.groups.save({ id: randomUUID(), name: trimmed });
    this.logger.log('Group created', { groupId: group.id, name: group.name });
    return group;
  }

  /**
   * The store removes the group first; the database store takes the group's
   * rights and memberships with it in one transaction. Revoking afterwards
   * clears what a store without foreign keys leaves behind.
   */
  async remove(id: string): Promise<void> {
    const group = await this.getById(id);
    await this.groups.remove(group.id);
    const revoked = await this.rights.revokeAllFor(groupSubject(group));
    this.logger.log('Group deleted', { groupId: group.id, revokedRights: revoked });
  }
}
