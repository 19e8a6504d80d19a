import { compactVerify, errors, SignJWT, type CompactVerifyResult } from 'jose';
import type { KeyManager } from '../keys/key-manager';
import { KeyType } from '../keys/key-type.enum';
import type { User } from '../users/user.entity';
import { systemClock, toNumericDate, type Clock } from './clock';
import {
  TOKEN_ALGORITHM,
  TOKEN_TYPE,
  tokenClaimsSchema,
  type SignedToken,
  type TokenClaims,
  type TokenHeader
} from './token.types';

export interface TokenServiceOptions {
  keyManager: KeyManager;
  /** Name of the ECDSA key pair held by the key manager */
  keyName: string;
  validitySeconds: number;
  clock?: Clock;
}

/**
 * Issues and validates ES512-signed JWTs whose issuer is the user's pseudo.
 *
 * A token is valid while `iat <= now <= exp`, both ends included.
 * Invalid tokens never throw; a missing signing key does (KeyUnavailableError).
 */
export class TokenService {
  private readonly keyManager: KeyManager;
  private readonly keyName: string;
  private readonly validitySeconds: number;
  private readonly clock: Clock;

  constructor(options: TokenServiceOptions) {
    this.keyManager = options.keyManager;
    this.keyName = options.keyName;
    this.validitySeconds = options.validitySeconds;
    this.clock = options.clock ?? systemClock;
  }

  async issue(user: Pick<User, 'pseudo'>): Promise<SignedToken> {
    const key = await this.keyManager.load(this.keyName, KeyType.ECDSA);

    const iat = toNumericDate(this.clock());
    const claims: TokenClaims = { iss: user.pseudo, iat, exp: iat + this.validitySeconds };
    const header: TokenHeader = { alg: TOKEN_ALGORITHM, typ: TOKEN_TYPE };

    const compact = await new SignJWT({})
      .setProtectedHeader(header)
      .setIssuer(claims.iss)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .sign(key.privateKey);

    return { compact, header, claims, signature: compact.slice(compact.lastIndexOf('.') + 1) };
  }

  /** @returns the token's claims when it is valid now, otherwise undefined */
  async verify(compact: string): Promise<TokenClaims | undefined> {
    // Outside the try: an unavailable key is a configuration failure, not a bad token.
    const key = await this.keyManager.load(this.keyName, KeyType.ECDSA);

    let verified: CompactVerifyResult;
    try {
      verified = await compactVerify(compact, key.publicKey, { algorithms: [TOKEN_ALGORITHM] });
    } catch (error) {
      if (error instanceof errors.JOSEError) return undefined;
      throw error;
    }

    if (verified.protectedHeader.typ !== TOKEN_TYPE) return undefined;

    const claims = parseClaims(verified.payload);
    if (!claims) return undefined;

    const now = toNumericDate(this.clock());
    if (now < claims.iat || now > claims.exp) return undefined;

    return claims;
  }

  async validate(compact: string): Promise<boolean> {
    return (await this.verify(compact)) !== undefined;
  }
}

function parseClaims(payload: Uint8Array): TokenClaims | undefined {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder().decode(payload));
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }

  const parsed = tokenClaimsSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}
