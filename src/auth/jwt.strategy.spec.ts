import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { Role } from '../common/types/permissions';
import { JwtStrategy } from './jwt.strategy';

describe('JwtStrategy', () => {
  const strategy = new JwtStrategy(new ConfigService({ JWT_SECRET: 'test-secret' }));

  it('maps claims onto an actor', () => {
    expect(strategy.validate({ sub: 'user-1', role: 'supervisor', name: 'Dana' })).toEqual({
      id: 'user-1',
      role: Role.SUPERVISOR,
      name: 'Dana',
      email: null,
    });
  });

  it('rejects unknown roles', () => {
    expect(() => strategy.validate({ sub: 'user-1', role: 'PRINCIPAL' })).toThrow(UnauthorizedException);
  });

  it('rejects tokens claiming the system role', () => {
    expect(() => strategy.validate({ sub: 'user-1', role: 'SYSTEM' })).toThrow(UnauthorizedException);
  });

  it('rejects payloads without a subject', () => {
    expect(() => strategy.validate({ role: 'STUDENT' })).toThrow(UnauthorizedException);
  });
});
