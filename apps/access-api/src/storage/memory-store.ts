import type { Entity, EntityStore } from './entity-store';

/**
 * In-process EntityStore. Subclasses supply the ordering used by `findAll`;
 * without one, insertion order is kept.
 */
export abstract class MemoryStore<T extends Entity> implements EntityStore<T> {
  protected readonly entities = new Map<string, T>();

  protected compare?(a: T, b: T): number;

  async findById(id: string): Promise<T | undefined> {
    return this.entities.get(id);
  }

  async findAll(): Promise<T[]> {
    const all = Array.from(this.entities.values());
    return this.compare ? all.sort((a, b) => this.compare?.(a, b) ?? 0) : all;
  }

  async save(entity: T): Promise<T> {
    this.entities.set(entity.id, entity);
    return entity;
  }

  async remove(id: string): Promise<boolean> {
    return this.entities.delete(id);
  }
}
