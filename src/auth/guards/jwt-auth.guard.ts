import { ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Actor, isActor } from '../../common/types/actor';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser = Actor>(err: unknown, user: TUser | false, info: unknown, context: ExecutionContext): TUser {
    if (err instanceof Error) {
      throw err;
    }
    if (user === false || !isActor(user)) {
      const request = context.switchToHttp().getRequest<{ url?: string }>();
      const reason = info instanceof Error ? info.message : 'no identity';
      this.logger.debug(`Rejected ${request.url ?? 'request'}: ${reason}`);
      throw new UnauthorizedException('Authentication required');
    }
    return user;
  }
}
