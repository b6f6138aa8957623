import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';

/**
 * Identity is resolved upstream; the gateway forwards the authenticated
 * user id in this header.
 */
export const USER_ID_HEADER = 'x-user-id';

export interface RequestWithHeaders {
  headers: Record<string, string | string[] | undefined>;
}

export function userIdFrom(request: RequestWithHeaders): string {
  const value = request.headers[USER_ID_HEADER];
  const userId = Array.isArray(value) ? value[0] : value;
  if (!userId) {
    throw new UnauthorizedException(`Missing ${USER_ID_HEADER} header`);
  }
  return userId;
}

export const CurrentUserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string =>
    userIdFrom(ctx.switchToHttp().getRequest<RequestWithHeaders>()),
);
