import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { Actor, isActor } from '../types/actor';

export const CurrentActor = createParamDecorator((_data: unknown, ctx: ExecutionContext): Actor => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const user: unknown = request.user;
  if (!isActor(user)) {
    throw new UnauthorizedException('Missing authenticated user');
  }
  return { id: user.id, role: user.role, name: user.name ?? null, email: user.email ?? null };
});
