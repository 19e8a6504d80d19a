import { Module } from '@nestjs/common';
import { GroupStoreModule } from '../groups/group-store.module';
import { storeProvider } from '../storage/store-provider';
import { UsersModule } from '../users/users.module';
import { RightDatabaseStore } from './right-database.store';
import { RightMemoryStore } from './right-memory.store';
import { RightsController } from './rights.controller';
import { RightsGuard } from './rights.guard';
import { RightsService } from './rights.service';
import { RIGHTS_STORE, type RightsStore } from './rights.store';

@Module({
  imports: [GroupStoreModule, UsersModule],
  controllers: [RightsController],
  providers: [
    storeProvider<RightsStore>(RIGHTS_STORE, {
      mysql: (db) => new RightDatabaseStore(db),
      memory: () => new RightMemoryStore()
    }),
    RightsService,
    RightsGuard
  ],
  exports: [RIGHTS_STORE, RightsService, RightsGuard]
})
export class RightsModule {}
