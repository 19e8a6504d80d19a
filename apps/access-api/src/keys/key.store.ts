import type { KeyType } from './key-type.enum';

export const KEY_STORE = 'access:keyStore';

/** Key material at rest: SPKI and PKCS#8 PEM. */
export interface StoredKey {
  readonly name: string;
  readonly type: KeyType;
  readonly publicKeyPem: string;
  readonly privateKeyPem: string;
}

export interface KeyStore {
  findByName(name: string, type: KeyType): Promise<StoredKey | undefined>;
  save(key: StoredKey): Promise<StoredKey>;
}
