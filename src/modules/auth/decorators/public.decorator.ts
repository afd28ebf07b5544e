import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * Marks a route as reachable without a token. A bearer token, when sent,
 * is still verified so handlers can tailor the response to the viewer.
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
