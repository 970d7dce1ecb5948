import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { RESPONSE_MESSAGE } from '../decorator/customize';

export interface HttpResponse<T> {
  statusCode: number;
  message: string;
  data: T;
}

/**
 * Wraps every successful HTTP result as `{ statusCode, message, data }`.
 * The message comes from `@ResponseMessage()` on the handler.
 */
@Injectable()
export class TransformInterceptor<T>
  implements NestInterceptor<T, HttpResponse<T>>
{
  constructor(private readonly reflector: Reflector) {}

  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<HttpResponse<T>> {
    const message =
      this.reflector.get<string | undefined>(
        RESPONSE_MESSAGE,
        context.getHandler(),
      ) ?? '';

    return next.handle().pipe(
      map(
        (data): HttpResponse<T> => ({
          statusCode: context.switchToHttp().getResponse<Response>().statusCode,
          message,
          data,
        }),
      ),
    );
  }
}
