import type { KeyType } from './key-type.enum';
import type { KeyStore, StoredKey } from './key.store';

export class KeyMemoryStore implements KeyStore {
  private readonly keys = new Map<string, StoredKey>();

  async findByName(name: string, type: KeyType): Promise<StoredKey | undefined> {
    return this.keys.get(`${type}:${name}`);
  }

  async save(key: StoredKey): Promise<StoredKey> {
    this.keys.set(`${key.type}:${key.name}`, key);
    return key;
  }
}
