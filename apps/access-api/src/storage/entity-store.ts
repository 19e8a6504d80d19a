/** Every persisted entity is addressed by a string id. */
export interface Entity {
  readonly id: string;
}

/**
 * Generic persistence contract shared by the mysql and memory drivers.
 * `findAll` returns entities in the store's own order criteria.
 */
export interface EntityStore<T extends Entity> {
  findById(id: string): Promise<T | undefined>;
  findAll(): Promise<T[]>;
  save(entity: T): Promise<T>;
  /** @returns false when nothing had that id */
  remove(id: string): Promise<boolean>;
}

export type StoreDriver = 'mysql' | 'memory';
