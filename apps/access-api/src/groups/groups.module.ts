import { Module } from '@nestjs/common';
import { RightsModule } from '../rights/rights.module';
import { GroupStoreModule } from './group-store.module';
import { GroupsController } from './groups.controller';
import { GroupsService } from './groups.service';

@Module({
  imports: [GroupStoreModule, RightsModule],
  controllers: [GroupsController],
  providers: [GroupsService],
  exports: [GroupsService]
})
export class GroupsModule {}
