import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { JwtPayloadType } from './types/jwt-payload.type';
import { AllConfigType } from '../../config/config.type';
import { isRole } from '../../roles/roles.enum';

/**
 * Verifies access tokens issued by the external identity provider.
 *
 * The service never issues tokens; it only trusts the `sub` and `role`
 * claims of a token whose signature checks out.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(configService: ConfigService<AllConfigType>) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      issuer: configService.get('auth.jwtIssuer', { infer: true }),
      audience: configService.get('auth.jwtAudience', { infer: true }),
      algorithms: configService.getOrThrow('auth.jwtAllowedAlgorithms', {
        infer: true,
      }),
    });
  }

  public validate(payload: Record<string, unknown>): JwtPayloadType {
    const { sub, role, iat, exp } = payload;

    if (typeof sub !== 'string' || sub.length === 0) {
      this.logger.warn('[JWT] Token without subject claim rejected');
      throw new UnauthorizedException();
    }
    if (!isRole(role)) {
      this.logger.warn(`[JWT] Token for ${sub} carries no known role`);
      throw new UnauthorizedException();
    }

    return {
      sub,
      role,
      iat: typeof iat === 'number' ? iat : undefined,
      exp: typeof exp === 'number' ? exp : undefined,
    };
  }
}
