import { Inject, Injectable } from '@nestjs/common';
import { exportPKCS8, exportSPKI, generateKeyPair, importPKCS8, importSPKI } from 'jose';
import { JsonLogger } from '../logging/json-logger.service';
import type { KeyManager, KeyPair } from './key-manager';
import { KEY_ALGORITHMS, KeyType } from './key-type.enum';
import { KeyUnavailableError } from './key-unavailable.error';
import { KEY_STORE, type KeyStore, type StoredKey } from './key.store';

/**
 * Resolves named key pairs from the key store and keeps the imported keys
 * for the process lifetime; stored keys never change once written.
 */
@Injectable()
export class KeyManagerService implements KeyManager {
  private readonly cache = new Map<string, KeyPair>();

  constructor(
    @Inject(KEY_STORE) private readonly store: KeyStore,
    private readonly logger: JsonLogger
  ) {}

  async load(name: string, type: KeyType): Promise<KeyPair> {
    const cached = this.cache.get(`${type}:${name}`);
    if (cached) return cached;

    const stored = await this.store.findByName(name, type);
    if (!stored) {
      this.logger.error('Key not found', { keyName: name, keyType: type });
      throw new KeyUnavailableError(name, type);
    }
    return this.importAndCache(stored);
  }

  async provision(name: string, type: KeyType): Promise<KeyPair> {
    const stored = await this.store.findByName(name, type);
    if (stored) return this.importAndCache(stored);

    const algorithm = KEY_ALGORITHMS[type];
    const { publicKey, privateKey } = await generateKeyPair(algorithm, { extractable: true });
    const saved = await this.store.save({
      name,
      type,
      publicKeyPem: await exportSPKI(publicKey),
      privateKeyPem: await exportPKCS8(privateKey)
    });

    this.logger.log('Key pair generated', { keyName: name, keyType: type, algorithm });
    return this.importAndCache(saved);
  }

  private async importAndCache(stored: StoredKey): Promise<KeyPair> {
    const algorithm = KEY_ALGORITHMS[stored.type];
    let pair: KeyPair;
    try {
      pair = {
        name: stored.name,
        type: stored.type,
        algorithm,
        publicKey: await importSPKI(stored.publicKeyPem, algorithm),
        privateKey: await importPKCS8(stored.privateKeyPem, algorithm)
      };
    } catch (error) {
      throw new KeyUnavailableError(stored.name, stored.type, `stored PEM cannot be imported (${(error as Error).message})`);
    }

    this.cache.set(`${stored.type}:${stored.name}`, pair);
    return pair;
  }
}
