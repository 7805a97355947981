import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthenticatedRequest, RequestContext } from './request-context';

/**
 * Injects the context resolved by BearerAuthGuard
 */
export const AuthContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestContext => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.auth) {
      throw new UnauthorizedException('Missing bearer token.');
    }
    return request.auth;
  },
);
