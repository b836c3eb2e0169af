import { ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import { Observable } from 'rxjs';
import { isAuthEnabled } from './auth.config';
import { IS_PUBLIC_KEY } from './public.decorator';

// Rutas @Public() siempre abiertas; el resto exige Bearer JWT solo con ENABLE_AUTH=true
@Injectable()
export class GlobalAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly reflector: Reflector) {
    super();
  }

  canActivate(context: ExecutionContext): boolean | Promise<boolean> | Observable<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic || !isAuthEnabled()) return true;
    return super.canActivate(context);
  }
}
