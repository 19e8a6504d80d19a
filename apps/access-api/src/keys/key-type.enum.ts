export enum KeyType {
  ECDSA = 'ECDSA',
  RSA = 'RSA'
}

/** JWS algorithm each key type signs with. */
export const KEY_ALGORITHMS: Readonly<Record<KeyType, string>> = {
  [KeyType.ECDSA]: 'ES512',
  [KeyType.RSA]: 'RS512'
};
