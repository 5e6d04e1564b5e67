import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import appConfig from '../../../config/app.config';
import { isRole } from '../../../common/guard/role/role.enum';
import { Principal } from '../../../common/interfaces/principal.interface';
import { isDbId } from '../../../common/helper/id.helper';

/** Claims issued by the identity service. */
export interface JwtPayload {
  sub: number | string;
  role: string;
  email?: string;
}

function toUserId(sub: unknown): number | null {
  const id = typeof sub === 'string' && /^\d+$/.test(sub) ? parseInt(sub, 10) : sub;
  return typeof id === 'number' && isDbId(id) ? id : null;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor() {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: appConfig().jwt.secret,
    });
  }

  /**
   * Whatever is returned here becomes `request.user`.
   */
  async validate(payload: JwtPayload): Promise<Principal> {
    const id = toUserId(payload.sub);
    if (id === null || !isRole(payload.role)) {
      this.logger.warn(`Rejected token with invalid claims (sub=${String(payload.sub)}, role=${String(payload.role)})`);
      throw new UnauthorizedException('Invalid token payload');
    }
    return { id, role: payload.role };
  }
}
