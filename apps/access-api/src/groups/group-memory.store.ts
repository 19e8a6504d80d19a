import { MemoryStore } from '../storage/memory-store';
import type { Group } from './group.entity';
import type { GroupStore } from './group.store';

export class GroupMemoryStore extends MemoryStore<Group> implements GroupStore {
  protected compare(a: Group, b: Group): number {
    return a.name.localeCompare(b.name);
  }

  async findByName(name: string): Promise<Group | undefined> {
    return Array.from(this.entities.values()).find((g) => g.name === name);
  }
}
