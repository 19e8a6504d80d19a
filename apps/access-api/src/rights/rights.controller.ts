import { Body, Controller, Delete, Get, HttpCode, Param, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiBody, ApiTags } from '@nestjs/swagger';
import { CreateRightDto } from './dto/create-right.dto';
import { ProtectedResource } from './protected-resource.decorator';
import { RightsGuard } from './rights.guard';
import { RightsService } from './rights.service';

/**
 * RightsController - REST API for grants.
 * Routes: /rights
 *
 * Access to this controller is itself governed by rights on the `rights` resource.
 */
@ApiTags('rights')
@ApiBearerAuth('bearer')
@Controller('rights')
@ProtectedResource('rights')
@UseGuards(RightsGuard)
export class RightsController {
  constructor(private readonly rights: RightsService) {}

  @Get()
  list() {
    return this.rights.list();
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return this.rights.getById(id);
  }

  @Post()
  @ApiBody({
    type: CreateRightDto,
    examples: {
      group: {
        summary: 'Let a group read every group',
        value: { groupId: 'group-admins', resource: 'groups', method: 'GET' }
      },
      user: {
        summary: 'Let a user delete one right',
        value: { userId: 'user-alice', resource: 'rights', instanceId: 'right-1', method: 'DELETE' }
      }
    }
  })
  grant(@Body() dto: CreateRightDto) {
    return this.rights.grant({
      groupId: dto.groupId,
      userId: dto.userId,
      resourceName: dto.resource,
      instanceId: dto.instanceId,
      method: dto.method
    });
  }

  @Delete(':id')
  @HttpCode(204)
  async revoke(@Param('id') id: string): Promise<void> {
    await this.rights.revoke(id);
  }
}
