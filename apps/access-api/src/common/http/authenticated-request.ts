import type { Request } from 'express';
import type { User } from '../../users/user.entity';

/**
 * Express request as seen after `createHttpLoggingMiddleware` and `TokenAuthGuard` ran.
 */
export type AuthenticatedRequest = Request & {
  /** Correlation ID, echoed back as x-request-id. */
  requestId?: string;

  /** Undefined means the route is public or the guard has not run yet. */
  user?: User;
};
