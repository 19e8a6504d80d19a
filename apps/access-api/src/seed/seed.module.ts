import { Module } from '@nestjs/common';
import { GroupStoreModule } from '../groups/group-store.module';
import { RightsModule } from '../rights/rights.module';
import { UsersModule } from '../users/users.module';
import { MemorySeedService } from './memory-seed.service';

@Module({
  imports: [GroupStoreModule, UsersModule, RightsModule],
  providers: [MemorySeedService]
})
export class SeedModule {}
