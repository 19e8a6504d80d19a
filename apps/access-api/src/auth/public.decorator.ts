import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

// Mark endpoints that skip token auth (e.g., /health, the dev token helper).
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
