import type { DatabaseService, DatabaseTransaction } from '../../src/database/database.service';
import { UserDatabaseStore } from '../../src/users/user-database.store';

function makeDb() {
  const tx = { deleteByKey: jest.fn().mockResolvedValue(1) };
  return {
    selectAll: jest.fn().mockResolvedValue([]),
    selectByKey: jest.fn((table: string) =>
      Promise.resolve(table === 'users' ? [{ id: 'u1', pseudo: 'alice' }] : [{ group_id: 'g1' }, { group_id: 'g2' }])
    ),
    insert: jest.fn().mockResolvedValue(undefined),
    deleteByKey: jest.fn().mockResolvedValue(1),
    transaction: jest.fn((work: (tx: DatabaseTransaction) => Promise<unknown>) => work(tx)),
    tx
  };
}

describe('UserDatabaseStore', () => {
  it('loads group memberships with the user', async () => {
    const db = makeDb();
    const store = new UserDatabaseStore(db as unknown as DatabaseService);

    await expect(store.findByPseudo('alice')).resolves.toEqual({ id: 'u1', pseudo: 'alice', groupIds: ['g1', 'g2'] });
    expect(db.selectByKey).toHaveBeenNthCalledWith(1, 'users', ['id', 'pseudo'], 'pseudo', 'alice');
    expect(db.selectByKey).toHaveBeenNthCalledWith(2, 'user_groups', ['group_id'], 'user_id', 'u1');
  });

  it('writes the user before its memberships', async () => {
    const db = makeDb();
    const store = new UserDatabaseStore(db as unknown as DatabaseService);

    await store.save({ id: 'u2', pseudo: 'bob', groupIds: ['g1'] });

    expect(db.insert.mock.calls).toEqual([
      ['users', { id: 'u2', pseudo: 'bob' }, ['id', 'pseudo']],
      ['user_groups', { user_id: 'u2', group_id: 'g1' }, ['user_id', 'group_id']]
    ]);
  });

  it('removes rights and memberships before the user in one transaction', async () => {
    const db = makeDb();
    const store = new UserDatabaseStore(db as unknown as DatabaseService);

    await expect(store.remove('u2')).resolves.toBe(true);
    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(db.tx.deleteByKey.mock.calls).toEqual([
      ['rights', 'user_id', 'u2'],
      ['user_groups', 'user_id', 'u2'],
      ['users', 'id', 'u2']
    ]);
    expect(db.deleteByKey).not.toHaveBeenCalled();
  });
});
