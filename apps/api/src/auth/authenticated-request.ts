import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { ERRORS } from '@chirpy/common/errors';

export interface AuthenticatedRequest extends Request {
  userId?: string;
}

/**
 * User ID attached by JwtAuthGuard
 */
export const CurrentUserId = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.userId) {
      throw ERRORS.MissingCredential('route is not guarded by JwtAuthGuard');
    }
    return request.userId;
  },
);
