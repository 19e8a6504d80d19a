import { Module } from '@nestjs/common';
import { storeProvider } from '../storage/store-provider';
import { GroupDatabaseStore } from './group-database.store';
import { GroupMemoryStore } from './group-memory.store';
import { GROUP_STORE, type GroupStore } from './group.store';

/** Store only, so RightsModule can resolve group subjects without importing the HTTP layer. */
@Module({
  providers: [
    storeProvider<GroupStore>(GROUP_STORE, {
      mysql: (db) => new GroupDatabaseStore(db),
      memory: () => new GroupMemoryStore()
    })
  ],
  exports: [GROUP_STORE]
})
export class GroupStoreModule {}
