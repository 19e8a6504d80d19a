export interface User {
  readonly id: string;
  /** Human-readable identifier; carried as the token issuer claim. */
  readonly pseudo: string;
  /** Groups whose rights this user inherits. */
  readonly groupIds: readonly string[];
}
