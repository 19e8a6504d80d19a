import type { KeyLike } from 'jose';
import type { KeyType } from './key-type.enum';

export const KEY_MANAGER = 'access:keyManager';

/** Named, typed asymmetric key material, imported and ready to sign/verify. */
export interface KeyPair {
  readonly name: string;
  readonly type: KeyType;
  readonly algorithm: string;
  readonly publicKey: KeyLike;
  readonly privateKey: KeyLike;
}

export interface KeyManager {
  /** @throws KeyUnavailableError when no key of that name and type is stored */
  load(name: string, type: KeyType): Promise<KeyPair>;

  /** Stored pair if present, otherwise a freshly generated one that is stored first. */
  provision(name: string, type: KeyType): Promise<KeyPair>;
}
