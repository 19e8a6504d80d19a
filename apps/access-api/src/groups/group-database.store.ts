import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService, OrderBy } from '../database/database.service';
import { DatabaseStore } from '../storage/database-store';
import type { Group } from './group.entity';
import type { GroupStore } from './group.store';

interface GroupRow extends RowDataPacket {
  id: string;
  name: string;
}

export class GroupDatabaseStore extends DatabaseStore<Group, GroupRow> implements GroupStore {
  protected readonly table = 'security_groups';
  protected readonly columns = ['id', 'name'] as const;
  protected readonly orderBy: readonly OrderBy[] = [{ column: 'name', direction: 'ASC' }];

  constructor(db: DatabaseService) {
    super(db);
  }

  async findByName(name: string): Promise<Group | undefined> {
    const rows = await this.db.selectByKey<GroupRow>(this.table, this.columns, 'name', name);
    const row = rows[0];
    return row ? this.toEntity(row) : undefined;
  }

  /** Rights and memberships of the group go with it, in one transaction. */
  async remove(id: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.deleteByKey('rights', 'group_id', id);
      await tx.deleteByKey('user_groups', 'group_id', id);
      return (await tx.deleteByKey(this.table, this.idColumn, id)) > 0;
    });
  }

  protected toEntity(row: GroupRow): Group {
    return { id: row.id, name: row.name };
  }

  protected toRow(group: Group): Record<string, unknown> {
    return { id: group.id, name: group.name };
  }
}
