import { Body, Controller, Delete, Get, HttpCode, Param, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiBody, ApiTags } from '@nestjs/swagger';
import { ProtectedResource } from '../rights/protected-resource.decorator';
import { RightsGuard } from '../rights/rights.guard';
import { CreateGroupDto } from './dto/create-group.dto';
import { GroupsService } from './groups.service';

/**
 * GroupsController - REST API for security groups.
 * Routes: /groups
 */
@ApiTags('groups')
@ApiBearerAuth('bearer')
@Controller('groups')
@ProtectedResource('groups')
@UseGuards(RightsGuard)
export class GroupsController {
  constructor(private readonly groups: GroupsService) {}

  @Get()
  list() {
    return this.groups.list();
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return this.groups.getById(id);
  }

  @Post()
  @ApiBody({
    type: CreateGroupDto,
    examples: {
      basic: { summary: 'Create group', value: { name: 'auditors' } }
    }
  })
  create(@Body() dto: CreateGroupDto) {
    return this.groups.create(dto.name);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@Param('id') id: string): Promise<void> {
    await this.groups.remove(id);
  }
}
