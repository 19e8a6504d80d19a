/**
 * Machine-readable error identifiers returned in error bodies.
 */
export const ERROR_CODES = {
  /** Missing, malformed, expired or foreign token */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** Authenticated, but no right covers the requested resource/method */
  FORBIDDEN: 'FORBIDDEN',

  /** Two rights match the same subject/resource/method triple */
  DUPLICATE_GRANT: 'DUPLICATE_GRANT',

  /** Writing a right whose subject/resource/method triple is already stored */
  RIGHT_EXISTS: 'RIGHT_EXISTS',

  /** A stored right carries both or neither subject */
  RIGHT_INTEGRITY: 'RIGHT_INTEGRITY',

  /** The configured signing key cannot be loaded */
  KEY_UNAVAILABLE: 'KEY_UNAVAILABLE',

  INTERNAL: 'INTERNAL'
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for failures that originate in the domain rather than in the request.
 * They always surface as 5xx: they point at bad data or bad configuration.
 */
export abstract class DomainError extends Error {
  abstract readonly code: ErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}
