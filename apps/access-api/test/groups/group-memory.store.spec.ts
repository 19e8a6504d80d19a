import { GroupMemoryStore } from '../../src/groups/group-memory.store';

describe('GroupMemoryStore', () => {
  let store: GroupMemoryStore;

  beforeEach(async () => {
    store = new GroupMemoryStore();
    await store.save({ id: 'g2', name: 'operators' });
    await store.save({ id: 'g1', name: 'admins' });
    await store.save({ id: 'g3', name: 'auditors' });
  });

  it('lists groups by name', async () => {
    expect((await store.findAll()).map((g) => g.name)).toEqual(['admins', 'auditors', 'operators']);
  });

  it('finds by id and by name', async () => {
    await expect(store.findById('g3')).resolves.toEqual({ id: 'g3', name: 'auditors' });
    await expect(store.findByName('operators')).resolves.toEqual({ id: 'g2', name: 'operators' });
    await expect(store.findByName('nobody')).resolves.toBeUndefined();
  });

  it('reports whether a removal happened', async () => {
    await expect(store.remove('g1')).resolves.toBe(true);
    await expect(store.remove('g1')).resolves.toBe(false);
    await expect(store.findById('g1')).resolves.toBeUndefined();
  });
});
