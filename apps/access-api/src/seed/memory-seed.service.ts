import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { GROUP_STORE, type GroupStore } from '../groups/group.store';
import { JsonLogger } from '../logging/json-logger.service';
import { resource, specificResource } from '../rights/resource';
import { RIGHTS_STORE, type RightsStore } from '../rights/rights.store';
import { groupSubject, userSubject, type Subject } from '../rights/subject';
import { USER_STORE, type UserStore } from '../users/user.store';
import { memorySeedSchema, type MemorySeed, type SeedRight } from './memory-seed.schema';

/**
 * Fills the memory stores from MEMORY_SEED_PATH at startup.
 * Only active with STORE_DRIVER=memory (validateEnv rejects the path otherwise).
 */
@Injectable()
export class MemorySeedService implements OnModuleInit {
  constructor(
    private readonly config: ConfigService,
    @Inject(GROUP_STORE) private readonly groups: GroupStore,
    @Inject(USER_STORE) private readonly users: UserStore,
    @Inject(RIGHTS_STORE) private readonly rights: RightsStore,
    private readonly logger: JsonLogger
  ) {}

  async onModuleInit(): Promise<void> {
    const path = this.config.get<string>('MEMORY_SEED_PATH');
    if (!path || this.config.get<string>('STORE_DRIVER') !== 'memory') return;

    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    const result = memorySeedSchema.safeParse(raw);
    if (!result.success) {
      const where = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new Error(`Invalid memory seed ${path}: ${where}`);
    }

    await this.apply(result.data);
    this.logger.log('Memory seed loaded', {
      path,
      groups: result.data.groups.length,
      users: result.data.users.length,
      rights: result.data.rights.length
    });
  }

  async apply(seed: MemorySeed): Promise<void> {
    for (const group of seed.groups) {
      await this.groups.save(group);
    }
    for (const user of seed.users) {
      await this.users.save(user);
    }
    for (const right of seed.rights) {
      await this.rights.save({
        id: right.id,
        subject: await this.subjectOf(right),
        resource: right.instanceId !== undefined ? specificResource(right.resource, right.instanceId) : resource(right.resource),
        method: right.method
      });
    }
  }

  private async subjectOf(right: SeedRight): Promise<Subject> {
    if (right.groupId !== undefined) {
      const group = await this.groups.findById(right.groupId);
      if (!group) throw new Error(`Seed right ${right.id} references unknown group ${right.groupId}`);
      return groupSubject(group);
    }

    const user = right.userId !== undefined ? await this.users.findById(right.userId) : undefined;
    if (!user) throw new Error(`Seed right ${right.id} references unknown user ${right.userId ?? ''}`);
    return userSubject(user);
  }
}
