import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService, OrderBy } from '../database/database.service';
import { DatabaseStore } from '../storage/database-store';
import type { User } from './user.entity';
import type { UserStore } from './user.store';

interface UserRow extends RowDataPacket {
  id: string;
  pseudo: string;
}

interface MembershipRow extends RowDataPacket {
  group_id: string;
}

/**
 * Users live in `users`; group membership in `user_groups(user_id, group_id)`.
 */
export class UserDatabaseStore extends DatabaseStore<User, UserRow> implements UserStore {
  protected readonly table = 'users';
  protected readonly columns = ['id', 'pseudo'] as const;
  protected readonly orderBy: readonly OrderBy[] = [{ column: 'pseudo', direction: 'ASC' }];

  constructor(db: DatabaseService) {
    super(db);
  }

  async findByPseudo(pseudo: string): Promise<User | undefined> {
    const rows = await this.db.selectByKey<UserRow>(this.table, this.columns, 'pseudo', pseudo);
    const row = rows[0];
    return row ? this.toEntity(row) : undefined;
  }

  async save(user: User): Promise<User> {
    await super.save(user);
    for (const groupId of user.groupIds) {
      await this.db.insert('user_groups', { user_id: user.id, group_id: groupId }, ['user_id', 'group_id']);
    }
    return user;
  }

  async remove(id: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.deleteByKey('rights', 'user_id', id);
      await tx.deleteByKey('user_groups', 'user_id', id);
      return (await tx.deleteByKey(this.table, this.idColumn, id)) > 0;
    });
  }

  protected async toEntity(row: UserRow): Promise<User> {
    const memberships = await this.db.selectByKey<MembershipRow>('user_groups', ['group_id'], 'user_id', row.id);
    return { id: row.id, pseudo: row.pseudo, groupIds: memberships.map((m) => m.group_id) };
  }

  protected toRow(user: User): Record<string, unknown> {
    return { id: user.id, pseudo: user.pseudo };
  }
}
