import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { GroupMemoryStore } from '../../src/groups/group-memory.store';
import { resource, specificResource } from '../../src/rights/resource';
import { RestMethod } from '../../src/rights/rest-method.enum';
import { DuplicateGrantError } from '../../src/rights/rights.errors';
import { RightsService } from '../../src/rights/rights.service';
import { groupSubject, userSubject } from '../../src/rights/subject';
import type { User } from '../../src/users/user.entity';
import { UserMemoryStore } from '../../src/users/user-memory.store';
import { makeLogger, type LoggerStub } from '../support/stubs';
import { UncheckedRightStore } from '../support/unchecked-right.store';

const alice: User = { id: 'u1', pseudo: 'alice', groupIds: ['g1'] };
const bob: User = { id: 'u2', pseudo: 'bob', groupIds: [] };

describe('RightsService', () => {
  let groups: GroupMemoryStore;
  let users: UserMemoryStore;
  let rights: UncheckedRightStore;
  let logger: LoggerStub;
  let service: RightsService;

  beforeEach(async () => {
    groups = new GroupMemoryStore();
    users = new UserMemoryStore();
    rights = new UncheckedRightStore();
    logger = makeLogger();
    service = new RightsService(rights, groups, users, logger);

    await groups.save({ id: 'g1', name: 'admins' });
    await users.save(alice);
    await users.save(bob);
  });

  describe('grant', () => {
    it('grants to a group', async () => {
      const right = await service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET });

      expect(right.subject).toEqual({ kind: 'group', group: { id: 'g1', name: 'admins' } });
      expect(right.resource).toEqual(resource('groups'));
      await expect(rights.findById(right.id)).resolves.toEqual(right);
    });

    it('grants to a user on one instance', async () => {
      const right = await service.grant({
        userId: 'u2',
        resourceName: 'groups',
        instanceId: 'g1',
        method: RestMethod.DELETE
      });

      expect(right.subject).toEqual(userSubject({ id: 'u2', pseudo: 'bob' }));
      expect(right.resource).toEqual(specificResource('groups', 'g1'));
    });

    it('requires exactly one subject', async () => {
      await expect(
        service.grant({ groupId: 'g1', userId: 'u1', resourceName: 'groups', method: RestMethod.GET })
      ).rejects.toBeInstanceOf(BadRequestException);
      await expect(service.grant({ resourceName: 'groups', method: RestMethod.GET })).rejects.toBeInstanceOf(
        BadRequestException
      );
    });

    it('rejects unknown subjects', async () => {
      await expect(
        service.grant({ groupId: 'nope', resourceName: 'groups', method: RestMethod.GET })
      ).rejects.toBeInstanceOf(NotFoundException);
      await expect(
        service.grant({ userId: 'nope', resourceName: 'groups', method: RestMethod.GET })
      ).rejects.toBeInstanceOf(NotFoundException);
    });

    it('refuses to store a second identical right', async () => {
      await service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET });

      await expect(
        service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET })
      ).rejects.toBeInstanceOf(ConflictException);
      expect(await rights.findAll()).toHaveLength(1);
    });

    it('lets only one of two concurrent identical grants through', async () => {
      const results = await Promise.allSettled([
        service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET }),
        service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET })
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      const failure = results[1];
      expect(failure.status === 'rejected' && failure.reason).toBeInstanceOf(ConflictException);
      expect(await rights.findAll()).toHaveLength(1);
      await expect(service.isGranted(alice, resource('groups'), RestMethod.GET)).resolves.toBe(true);
    });
  });

  describe('revoke', () => {
    it('removes a right', async () => {
      const right = await service.grant({ userId: 'u1', resourceName: 'rights', method: RestMethod.GET });

      await service.revoke(right.id);

      await expect(service.getById(right.id)).rejects.toBeInstanceOf(NotFoundException);
    });

    it('404 for an unknown right', async () => {
      await expect(service.revoke('missing')).rejects.toBeInstanceOf(NotFoundException);
    });

    it('removes every right of one subject only', async () => {
      await service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET });
      await service.grant({ groupId: 'g1', resourceName: 'rights', method: RestMethod.GET });
      const kept = await service.grant({ userId: 'u1', resourceName: 'groups', method: RestMethod.GET });

      await expect(service.revokeAllFor(groupSubject({ id: 'g1', name: 'admins' }))).resolves.toBe(2);

      expect(await service.list()).toEqual([kept]);
    });
  });

  describe('isGranted', () => {
    it('denies by default', async () => {
      await expect(service.isGranted(alice, resource('groups'), RestMethod.GET)).resolves.toBe(false);
    });

    it('grants through a direct user right', async () => {
      await service.grant({ userId: 'u2', resourceName: 'groups', method: RestMethod.POST });

      await expect(service.isGranted(bob, resource('groups'), RestMethod.POST)).resolves.toBe(true);
      await expect(service.isGranted(bob, resource('groups'), RestMethod.PUT)).resolves.toBe(false);
    });

    it('grants through a group the user belongs to', async () => {
      await service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.GET });

      await expect(service.isGranted(alice, resource('groups'), RestMethod.GET)).resolves.toBe(true);
      await expect(service.isGranted(bob, resource('groups'), RestMethod.GET)).resolves.toBe(false);
    });

    it('lets a generic right cover every instance', async () => {
      await service.grant({ groupId: 'g1', resourceName: 'groups', method: RestMethod.DELETE });

      await expect(service.isGranted(alice, specificResource('groups', 'g42'), RestMethod.DELETE)).resolves.toBe(true);
    });

    it('keeps an instance right to that instance', async () => {
      await service.grant({ userId: 'u2', resourceName: 'groups', instanceId: 'g1', method: RestMethod.GET });

      await expect(service.isGranted(bob, specificResource('groups', 'g1'), RestMethod.GET)).resolves.toBe(true);
      await expect(service.isGranted(bob, specificResource('groups', 'g2'), RestMethod.GET)).resolves.toBe(false);
      await expect(service.isGranted(bob, resource('groups'), RestMethod.GET)).resolves.toBe(false);
    });

    it('skips memberships pointing at missing groups', async () => {
      const ghost: User = { id: 'u3', pseudo: 'ghost', groupIds: ['gone'] };

      await expect(service.isGranted(ghost, resource('groups'), RestMethod.GET)).resolves.toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('User references a missing group', { userId: 'u3', groupId: 'gone' });
    });

    it('propagates duplicate grants', async () => {
      const subject = userSubject(bob);
      rights.plant({ id: 'dup-1', subject, resource: resource('groups'), method: RestMethod.GET });
      rights.plant({ id: 'dup-2', subject, resource: resource('groups'), method: RestMethod.GET });

      await expect(service.isGranted(bob, resource('groups'), RestMethod.GET)).rejects.toBeInstanceOf(
        DuplicateGrantError
      );
    });
  });
});
