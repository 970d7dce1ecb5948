import { Catch, ArgumentsHost, Logger, HttpException } from '@nestjs/common';
import { BaseWsExceptionFilter, WsException } from '@nestjs/websockets';
import { SocketEvents } from '../../common/constants/socket-events.constant';
import type { AuthenticatedSocket } from '../../common/interfaces/socket-client.interface';
import { ChatDomainException } from '../../common/errors/chat-domain.errors';

interface WsErrorResponse {
  message: string | object;
  code: string;
  details?: unknown;
  timestamp: string;
}

@Catch()
export class WsExceptionFilter extends BaseWsExceptionFilter {
  private readonly logger = new Logger(WsExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const client = host.switchToWs().getClient<AuthenticatedSocket>();
    const errorResponse = this.buildErrorResponse(exception);

    const logMessage =
      typeof errorResponse.message === 'string'
        ? errorResponse.message
        : JSON.stringify(errorResponse.message);
    const who = client.principal?.username ?? 'anonymous';

    if (errorResponse.code === 'INTERNAL_ERROR') {
      this.logger.error(
        `WebSocket error for ${who} (${client.id}): ${logMessage}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`WebSocket warning for ${who} (${client.id}): ${logMessage}`);
    }

    client.emit(SocketEvents.EXCEPTION, errorResponse);
  }

  private buildErrorResponse(exception: unknown): WsErrorResponse {
    const timestamp = new Date().toISOString();

    if (exception instanceof ChatDomainException) {
      return { message: exception.message, code: exception.kind, timestamp };
    }

    if (exception instanceof WsException) {
      const error = exception.getError();
      if (typeof error === 'string') {
        return { message: error, code: 'WS_EXCEPTION', timestamp };
      }
      const details =
        typeof error === 'object' && 'details' in error ? error.details : undefined;
      const message =
        typeof error === 'object' &&
        'message' in error &&
        typeof error.message === 'string'
          ? error.message
          : error;
      return { message, code: 'WS_EXCEPTION', details, timestamp };
    }

    if (exception instanceof HttpException) {
      return { message: exception.message, code: 'HTTP_EXCEPTION', timestamp };
    }

    return { message: 'Internal server error', code: 'INTERNAL_ERROR', timestamp };
  }
}
