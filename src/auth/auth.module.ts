import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule } from '../config/config.module';
import { JwtStrategy } from './jwt.strategy';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { CapabilitiesGuard } from '../common/guards/capabilities.guard';

@Module({
  imports: [PassportModule.register({ defaultStrategy: 'jwt' }), ConfigModule],
  providers: [JwtStrategy, JwtAuthGuard, CapabilitiesGuard],
  exports: [PassportModule, JwtAuthGuard, CapabilitiesGuard],
})
export class AuthModule {}
