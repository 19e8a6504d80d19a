import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class IssueTokenDto {
  @ApiProperty({ example: 'alice' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  pseudo!: string;
}

export class TokenResponseDto {
  @ApiProperty()
  accessToken!: string;

  @ApiProperty({ example: 'Bearer' })
  tokenType!: string;

  /** Seconds until expiry */
  @ApiProperty({ example: 3600 })
  expiresIn!: number;

  /** NumericDate */
  @ApiProperty()
  expiresAt!: number;
}
