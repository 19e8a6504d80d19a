import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { JsonLogger } from '../logging/json-logger.service';
import type { User } from '../users/user.entity';
import { USER_STORE, type UserStore } from '../users/user.store';
import type { TokenResponseDto } from './dto/issue-token.dto';
import { TokenService } from './token.service';
import type { SignedToken } from './token.types';

@Injectable()
export class AuthService {
  constructor(
    private readonly tokens: TokenService,
    @Inject(USER_STORE) private readonly users: UserStore,
    private readonly logger: JsonLogger
  ) {}

  async issueForPseudo(pseudo: string): Promise<TokenResponseDto> {
    const user = await this.users.findByPseudo(pseudo);
    if (!user) throw new NotFoundException('User not found');
    return this.issueFor(user);
  }

  async issueFor(user: User): Promise<TokenResponseDto> {
    const token = await this.tokens.issue(user);
    this.logger.log('Token issued', { userPseudo: user.pseudo, expiresAt: token.claims.exp });
    return toResponse(token);
  }
}

function toResponse(token: SignedToken): TokenResponseDto {
  return {
    accessToken: token.compact,
    tokenType: 'Bearer',
    expiresIn: token.claims.exp - token.claims.iat,
    expiresAt: token.claims.exp
  };
}
