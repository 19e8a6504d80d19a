import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService, OrderBy } from '../database/database.service';
import type { Entity, EntityStore } from './entity-store';

/**
 * EntityStore over one table. Subclasses declare the table layout, the
 * order-by criteria for `findAll` and the row <-> entity mapping.
 */
export abstract class DatabaseStore<T extends Entity, Row extends RowDataPacket> implements EntityStore<T> {
  protected abstract readonly table: string;
  protected abstract readonly columns: readonly string[];
  protected readonly idColumn: string = 'id';
  protected readonly orderBy: readonly OrderBy[] = [];

  protected constructor(protected readonly db: DatabaseService) {}

  protected abstract toEntity(row: Row): T | Promise<T>;
  protected abstract toRow(entity: T): Record<string, unknown>;

  async findById(id: string): Promise<T | undefined> {
    const rows = await this.db.selectByKey<Row>(this.table, this.columns, this.idColumn, id);
    const row = rows[0];
    return row ? this.toEntity(row) : undefined;
  }

  async findAll(): Promise<T[]> {
    const rows = await this.db.selectAll<Row>(this.table, this.columns, this.orderBy);
    return Promise.all(rows.map((row) => this.toEntity(row)));
  }

  async save(entity: T): Promise<T> {
    await this.db.insert(this.table, this.toRow(entity), this.columns);
    return entity;
  }

  async remove(id: string): Promise<boolean> {
    return (await this.db.deleteByKey(this.table, this.idColumn, id)) > 0;
  }
}
