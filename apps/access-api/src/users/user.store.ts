import type { EntityStore } from '../storage/entity-store';
import type { User } from './user.entity';

export const USER_STORE = 'access:userStore';

export interface UserStore extends EntityStore<User> {
  findByPseudo(pseudo: string): Promise<User | undefined>;
}
