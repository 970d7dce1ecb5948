import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { ConfigType } from '@nestjs/config';
import type { Socket } from 'socket.io';
import type { Principal } from '../../common/interfaces/principal.interface';
import jwtConfig from '../../config/jwt.config';
import { toPrincipal } from '../../modules/identity/interfaces/jwt-payload.interface';

@Injectable()
export class SocketAuthService {
  private readonly logger = new Logger(SocketAuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(jwtConfig.KEY)
    private readonly jwtConfiguration: ConfigType<typeof jwtConfig>,
  ) {}

  /**
   * Resolve the principal of a connecting socket, or null when the
   * handshake carries no valid access token.
   */
  async authenticateSocket(
    client: Pick<Socket, 'id' | 'handshake'>,
  ): Promise<Principal | null> {
    const token = this.extractToken(client);
    if (!token) {
      this.logger.debug(`Socket ${client.id}: No authentication token provided`);
      return null;
    }

    try {
      const payload: unknown = await this.jwtService.verifyAsync(token, {
        secret: this.jwtConfiguration.accessToken.secret,
      });
      const principal = toPrincipal(payload);
      if (!principal) {
        this.logger.debug(`Socket ${client.id}: Invalid token payload`);
      }
      return principal;
    } catch (error) {
      this.logger.debug(
        `Socket ${client.id}: Authentication error: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  private extractToken(client: Pick<Socket, 'handshake'>): string | null {
    // Socket.IO v4 auth object first
    const auth: unknown = client.handshake.auth;
    if (
      typeof auth === 'object' &&
      auth !== null &&
      'token' in auth &&
      typeof auth.token === 'string'
    ) {
      return auth.token;
    }

    const authHeader = client.handshake.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      return authHeader.substring(7);
    }

    const queryToken = client.handshake.query.token;
    if (typeof queryToken === 'string') {
      return queryToken;
    }

    return null;
  }
}
