import type { EntityStore } from '../storage/entity-store';
import type { Group } from './group.entity';

export const GROUP_STORE = 'access:groupStore';

export interface GroupStore extends EntityStore<Group> {
  findByName(name: string): Promise<Group | undefined>;
}
