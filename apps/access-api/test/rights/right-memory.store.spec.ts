import { resource, specificResource } from '../../src/rights/resource';
import { RestMethod } from '../../src/rights/rest-method.enum';
import { DuplicateGrantError, RightAlreadyGrantedError } from '../../src/rights/rights.errors';
import { groupSubject, userSubject } from '../../src/rights/subject';
import { UncheckedRightStore } from '../support/unchecked-right.store';

const admins = groupSubject({ id: 'g1', name: 'admins' });
const alice = userSubject({ id: 'u1', pseudo: 'alice' });

describe('RightMemoryStore', () => {
  let store: UncheckedRightStore;

  beforeEach(async () => {
    store = new UncheckedRightStore();
    await store.save({ id: 'r1', subject: admins, resource: resource('groups'), method: RestMethod.GET });
    await store.save({ id: 'r2', subject: alice, resource: specificResource('groups', 'g1'), method: RestMethod.DELETE });
  });

  it('returns the stored right for its exact triple', async () => {
    await expect(store.find(admins, resource('groups'), RestMethod.GET)).resolves.toMatchObject({ id: 'r1' });
    await expect(store.find(alice, specificResource('groups', 'g1'), RestMethod.DELETE)).resolves.toMatchObject({
      id: 'r2'
    });
  });

  it('returns undefined when any coordinate differs', async () => {
    await expect(store.find(admins, resource('groups'), RestMethod.POST)).resolves.toBeUndefined();
    await expect(store.find(admins, resource('rights'), RestMethod.GET)).resolves.toBeUndefined();
    await expect(store.find(alice, resource('groups'), RestMethod.GET)).resolves.toBeUndefined();
  });

  it('keeps generic and specific resources apart', async () => {
    await expect(store.find(alice, resource('groups'), RestMethod.DELETE)).resolves.toBeUndefined();
    await expect(store.find(alice, specificResource('groups', 'g2'), RestMethod.DELETE)).resolves.toBeUndefined();
    await expect(store.find(admins, specificResource('groups', 'g1'), RestMethod.GET)).resolves.toBeUndefined();
  });

  it('does not confuse a group and a user sharing an id', async () => {
    const lookalike = userSubject({ id: 'g1', pseudo: 'g1' });

    await expect(store.find(lookalike, resource('groups'), RestMethod.GET)).resolves.toBeUndefined();
  });

  it('refuses to store a second right for the same triple', async () => {
    const attempt = store.save({ id: 'r3', subject: admins, resource: resource('groups'), method: RestMethod.GET });

    await expect(attempt).rejects.toBeInstanceOf(RightAlreadyGrantedError);
    await expect(attempt).rejects.toThrow('GET on groups is already granted to group:admins');
    await expect(store.findById('r3')).resolves.toBeUndefined();
  });

  it('lets the same right be saved again under its own id', async () => {
    await expect(
      store.save({ id: 'r1', subject: admins, resource: resource('groups'), method: RestMethod.GET })
    ).resolves.toMatchObject({ id: 'r1' });
  });

  it('rejects only one of two concurrent saves of a triple', async () => {
    const results = await Promise.allSettled([
      store.save({ id: 'c1', subject: alice, resource: resource('rights'), method: RestMethod.GET }),
      store.save({ id: 'c2', subject: alice, resource: resource('rights'), method: RestMethod.GET })
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
  });

  it('raises on duplicate grants instead of picking one', async () => {
    store.plant({ id: 'r3', subject: admins, resource: resource('groups'), method: RestMethod.GET });

    const attempt = store.find(admins, resource('groups'), RestMethod.GET);

    await expect(attempt).rejects.toBeInstanceOf(DuplicateGrantError);
    await expect(attempt).rejects.toThrow('2 rights grant GET on groups to group:admins; expected at most one');
  });

  it('lists the rights held by a subject', async () => {
    expect((await store.findBySubject(alice)).map((r) => r.id)).toEqual(['r2']);
  });
});
