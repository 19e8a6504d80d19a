import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AuthModule } from './auth/auth.module';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { GroupsModule } from './groups/groups.module';
import { KeysModule } from './keys/keys.module';
import { LoggingModule } from './logging/logging.module';
import { RightsModule } from './rights/rights.module';
import { SeedModule } from './seed/seed.module';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      // .env files are optional, for local development only.
      envFilePath: ['.env', '.env.local'],
      validate: validateEnv
    }),
    LoggingModule,
    DatabaseModule,
    KeysModule,
    UsersModule,
    RightsModule,
    GroupsModule,
    AuthModule,
    SeedModule
  ],
  controllers: [AppController],
  providers: [AppService]
})
export class AppModule {}
