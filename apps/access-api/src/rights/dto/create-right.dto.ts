import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { RestMethod } from '../rest-method.enum';

/**
 * CreateRightDto - grants one method on one resource to exactly one subject.
 * Supplying both or neither of groupId/userId is rejected by RightsService.
 */
export class CreateRightDto {
  @ApiPropertyOptional({ description: 'Group receiving the right' })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  groupId?: string;

  @ApiPropertyOptional({ description: 'User receiving the right' })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  userId?: string;

  @ApiProperty({ example: 'groups' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  resource!: string;

  /** Narrows the right to a single instance of the resource */
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  instanceId?: string;

  @ApiProperty({ enum: RestMethod })
  @IsEnum(RestMethod)
  method!: RestMethod;
}
