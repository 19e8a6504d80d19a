import { Body, Controller, HttpCode, NotFoundException, Post, Req, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { AuthenticatedRequest } from '../common/http/authenticated-request';
import { AuthService } from './auth.service';
import { IssueTokenDto, TokenResponseDto } from './dto/issue-token.dto';
import { Public } from './public.decorator';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly auth: AuthService,
    private readonly config: ConfigService
  ) {}

  @Post('token')
  @Public()
  @HttpCode(200)
  @ApiOperation({
    summary: 'Issue a token for an existing user (development only)',
    description:
      'Convenience endpoint for Swagger testing. No credentials are checked, so it answers 404 ' +
      'when NODE_ENV=production.'
  })
  @ApiResponse({ status: 200, type: TokenResponseDto })
  @ApiResponse({ status: 404, description: 'Unknown pseudo, or the endpoint is disabled.' })
  issue(@Body() body: IssueTokenDto): Promise<TokenResponseDto> {
    if (this.config.get<string>('NODE_ENV') === 'production') {
      throw new NotFoundException();
    }
    return this.auth.issueForPseudo(body.pseudo);
  }

  @Post('refresh')
  @HttpCode(200)
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'Issue a fresh token for the caller' })
  @ApiResponse({ status: 200, type: TokenResponseDto })
  @ApiResponse({ status: 401, description: 'Missing, invalid or expired token.' })
  refresh(@Req() req: AuthenticatedRequest): Promise<TokenResponseDto> {
    if (!req.user) throw new UnauthorizedException('Unauthorized');
    return this.auth.issueFor(req.user);
  }
}
