import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '../config/config.service';
import { Actor } from '../common/types/actor';
import { Role, isRole } from '../common/types/permissions';

export interface JwtPayload {
  sub: string;
  role: string;
  name?: string;
  email?: string;
}

function isJwtPayload(value: unknown): value is JwtPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sub' in value &&
    'role' in value &&
    typeof value.sub === 'string' &&
    typeof value.role === 'string'
  );
}

/**
 * Tokens are issued by the account service; this service only trusts the
 * signature and maps the claims onto an {@link Actor}.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('JWT_SECRET'),
    });
  }

  validate(payload: unknown): Actor {
    if (!isJwtPayload(payload)) {
      throw new UnauthorizedException('Malformed token');
    }
    const role = payload.role.toUpperCase();
    // SYSTEM is reserved for scheduled jobs and never comes from a token
    if (!isRole(role) || role === Role.SYSTEM) {
      throw new UnauthorizedException(`Unknown role ${payload.role}`);
    }
    return {
      id: payload.sub,
      role,
      name: payload.name ?? null,
      email: payload.email ?? null,
    };
  }
}
