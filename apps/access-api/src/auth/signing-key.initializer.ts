import { Inject, Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KEY_MANAGER, type KeyManager } from '../keys/key-manager';
import { KeyType } from '../keys/key-type.enum';
import { JsonLogger } from '../logging/json-logger.service';

/** Creates the token signing key on startup when KEY_AUTO_PROVISION is on. */
@Injectable()
export class SigningKeyInitializer implements OnApplicationBootstrap {
  constructor(
    @Inject(KEY_MANAGER) private readonly keys: KeyManager,
    private readonly config: ConfigService,
    private readonly logger: JsonLogger
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.get<boolean>('KEY_AUTO_PROVISION')) return;

    const keyName = this.config.getOrThrow<string>('TOKEN_SIGNING_KEY_NAME');
    const pair = await this.keys.provision(keyName, KeyType.ECDSA);
    this.logger.log('Signing key ready', { keyName: pair.name, algorithm: pair.algorithm });
  }
}
