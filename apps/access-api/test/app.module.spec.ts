import { join } from 'node:path';
import { Test, TestingModule } from '@nestjs/testing';
import { AuthService } from '../src/auth/auth.service';
import { TokenService } from '../src/auth/token.service';
import { GroupsService } from '../src/groups/groups.service';
import { resource, specificResource } from '../src/rights/resource';
import { RestMethod } from '../src/rights/rest-method.enum';
import { RightsService } from '../src/rights/rights.service';
import { USER_STORE, type UserStore } from '../src/users/user.store';

const ENV = {
  STORE_DRIVER: 'memory',
  KEY_AUTO_PROVISION: 'true',
  MEMORY_SEED_PATH: join(__dirname, '../seed/dev-seed.json'),
  TOKEN_VALIDITY_SECONDS: '60'
};

describe('AppModule (memory driver)', () => {
  let moduleRef: TestingModule;

  beforeAll(async () => {
    Object.assign(process.env, ENV);
    // ConfigModule.forRoot reads the environment when app.module is first loaded.
    const { AppModule } = await import('../src/app.module');
    moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    await moduleRef.init();
  });

  afterAll(async () => {
    await moduleRef.close();
    for (const key of Object.keys(ENV)) {
      delete process.env[key];
    }
  });

  it('seeds the stores and evaluates inherited rights', async () => {
    const users = moduleRef.get<UserStore>(USER_STORE);
    const rights = moduleRef.get(RightsService);

    const alice = await users.findByPseudo('alice');
    const carol = await users.findByPseudo('carol');
    if (!alice || !carol) throw new Error('seed users missing');

    await expect(rights.isGranted(alice, specificResource('groups', 'group-auditors'), RestMethod.DELETE)).resolves.toBe(
      true
    );
    await expect(rights.isGranted(carol, specificResource('groups', 'group-auditors'), RestMethod.GET)).resolves.toBe(
      true
    );
    await expect(rights.isGranted(carol, resource('groups'), RestMethod.GET)).resolves.toBe(false);
  });

  it('issues tokens with the provisioned signing key', async () => {
    const issued = await moduleRef.get(AuthService).issueForPseudo('bob');

    expect(issued.tokenType).toBe('Bearer');
    expect(issued.expiresIn).toBe(60);
    await expect(moduleRef.get(TokenService).verify(issued.accessToken)).resolves.toMatchObject({ iss: 'bob' });
  });

  it('drops the rights of a deleted group', async () => {
    const groups = moduleRef.get(GroupsService);
    const rights = moduleRef.get(RightsService);

    await groups.remove('group-auditors');

    expect((await rights.list()).map((r) => r.id)).not.toContain('right-auditors-rights-get');
    await expect(groups.list()).resolves.toEqual([{ id: 'group-admins', name: 'admins' }]);
  });
});
