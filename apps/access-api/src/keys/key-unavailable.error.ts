import { DomainError, ERROR_CODES } from '../common/http/error-codes';
import type { KeyType } from './key-type.enum';

/** Configuration problem, not a validation outcome: never retried, never swallowed. */
export class KeyUnavailableError extends DomainError {
  readonly code = ERROR_CODES.KEY_UNAVAILABLE;

  constructor(readonly keyName: string, readonly keyType: KeyType, reason = 'not found in key store') {
    super(`Key "${keyName}" (${keyType}) is unavailable: ${reason}`);
  }
}
