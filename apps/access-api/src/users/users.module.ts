import { Module } from '@nestjs/common';
import { storeProvider } from '../storage/store-provider';
import { UserDatabaseStore } from './user-database.store';
import { UserMemoryStore } from './user-memory.store';
import { USER_STORE, type UserStore } from './user.store';

@Module({
  providers: [
    storeProvider<UserStore>(USER_STORE, {
      mysql: (db) => new UserDatabaseStore(db),
      memory: () => new UserMemoryStore()
    })
  ],
  exports: [USER_STORE]
})
export class UsersModule {}
