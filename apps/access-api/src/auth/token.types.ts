import { z } from 'zod';

export const TOKEN_ALGORITHM = 'ES512';
export const TOKEN_TYPE = 'JWT';

export type TokenHeader = {
  alg: typeof TOKEN_ALGORITHM;
  typ: typeof TOKEN_TYPE;
};

export const tokenClaimsSchema = z.object({
  iss: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int()
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

/** An issued token: the compact JWS plus its decoded parts. Never persisted. */
export interface SignedToken {
  compact: string;
  header: TokenHeader;
  claims: TokenClaims;
  signature: string;
}
