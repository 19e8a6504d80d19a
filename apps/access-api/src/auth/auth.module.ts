import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { KEY_MANAGER, type KeyManager } from '../keys/key-manager';
import { KeysModule } from '../keys/keys.module';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { SigningKeyInitializer } from './signing-key.initializer';
import { TokenAuthGuard } from './token-auth.guard';
import { TokenService } from './token.service';

@Module({
  imports: [KeysModule, UsersModule],
  controllers: [AuthController],
  providers: [
    {
      provide: TokenService,
      inject: [KEY_MANAGER, ConfigService],
      useFactory: (keyManager: KeyManager, config: ConfigService) =>
        new TokenService({
          keyManager,
          keyName: config.getOrThrow<string>('TOKEN_SIGNING_KEY_NAME'),
          validitySeconds: config.getOrThrow<number>('TOKEN_VALIDITY_SECONDS')
        })
    },
    AuthService,
    SigningKeyInitializer,
    {
      // Every route needs a bearer token unless marked @Public.
      provide: APP_GUARD,
      useClass: TokenAuthGuard
    }
  ],
  exports: [TokenService]
})
export class AuthModule {}
