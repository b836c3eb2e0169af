import { createParamDecorator, ExecutionContext } from '@nestjs/common';

export interface AuthUser {
  userId: number;
  name?: string;
  role?: string;
}

export interface JwtPayload {
  sub: number | string;
  name?: string;
  role?: string;
}

export const User = createParamDecorator((data: unknown, ctx: ExecutionContext): AuthUser | undefined => {
  const req = ctx.switchToHttp().getRequest<{ user?: AuthUser }>();
  return req?.user;
});
