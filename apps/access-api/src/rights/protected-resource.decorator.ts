import { SetMetadata } from '@nestjs/common';

export const PROTECTED_RESOURCE_KEY = 'access:protectedResource';

/**
 * Names the resource a controller (or handler) guards. RightsGuard narrows it
 * to a SpecificResource when the route carries an `:id` param.
 */
export const ProtectedResource = (name: string) => SetMetadata(PROTECTED_RESOURCE_KEY, name);
