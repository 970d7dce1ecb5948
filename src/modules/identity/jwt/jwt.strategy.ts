import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { ConfigType } from '@nestjs/config';
import jwtConfig from '../../../config/jwt.config';
import type { Principal } from '../../../common/interfaces/principal.interface';
import { toPrincipal } from '../interfaces/jwt-payload.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    @Inject(jwtConfig.KEY)
    jwtConfiguration: ConfigType<typeof jwtConfig>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: jwtConfiguration.accessToken.secret,
    });
  }

  /**
   * Runs after signature verification. The returned principal becomes
   * `req.user`.
   */
  validate(payload: unknown): Principal {
    const principal = toPrincipal(payload);
    if (!principal) {
      throw new UnauthorizedException('Invalid token payload');
    }
    return principal;
  }
}
