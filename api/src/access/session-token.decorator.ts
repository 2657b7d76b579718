import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';

export const SESSION_COOKIE = 'sid';

const BEARER_PREFIX = 'Bearer ';

/**
 * 세션 토큰 추출
 * sid 쿠키 우선, 없으면 Authorization: Bearer 헤더
 */
export function extractSessionToken(request: Request): string | undefined {
  const cookies: unknown = request.cookies;
  if (typeof cookies === 'object' && cookies !== null && SESSION_COOKIE in cookies) {
    const value: unknown = Reflect.get(cookies, SESSION_COOKIE);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }

  const authorization = request.headers.authorization;
  if (authorization?.startsWith(BEARER_PREFIX)) {
    const token = authorization.slice(BEARER_PREFIX.length).trim();
    return token.length > 0 ? token : undefined;
  }
  return undefined;
}

export const SessionToken = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string | undefined =>
    extractSessionToken(context.switchToHttp().getRequest<Request>()),
);
