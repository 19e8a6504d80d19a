import { MemoryStore } from '../storage/memory-store';
import type { User } from './user.entity';
import type { UserStore } from './user.store';

export class UserMemoryStore extends MemoryStore<User> implements UserStore {
  protected compare(a: User, b: User): number {
    return a.pseudo.localeCompare(b.pseudo);
  }

  async findByPseudo(pseudo: string): Promise<User | undefined> {
    return Array.from(this.entities.values()).find((u) => u.pseudo === pseudo);
  }
}
