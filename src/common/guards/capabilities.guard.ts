import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { CAPABILITIES_KEY } from '../decorators/capabilities.decorator';
import { isActor } from '../types/actor';
import { Capability, hasAnyCapability } from '../types/permissions';

@Injectable()
export class CapabilitiesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<Capability[] | undefined>(CAPABILITIES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!required || required.length === 0) {
      return true;
    }

    const user: unknown = context.switchToHttp().getRequest<Request>().user;
    if (!isActor(user)) return false;
    return hasAnyCapability(user.role, required);
  }
}
