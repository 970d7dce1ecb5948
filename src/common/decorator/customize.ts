import {
  createParamDecorator,
  ExecutionContext,
  SetMetadata,
} from '@nestjs/common';
import type { Request } from 'express';
import type { Principal } from '../interfaces/principal.interface';

export const IS_PUBLIC_KEY = 'isPublic';
/**
 * Decorator to mark routes as public (no authentication required)
 * Usage: @Public()
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);

export const RESPONSE_MESSAGE = 'response_message';
export const ResponseMessage = (message: string) =>
  SetMetadata(RESPONSE_MESSAGE, message);

/**
 * Extracts the authenticated principal placed on the request by JwtStrategy
 * Usage: @CurrentUser() user: Principal
 */
export const CurrentUser = createParamDecorator(
  (data: keyof Principal | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const user = request.user;
    return data ? user?.[data] : user;
  },
);
