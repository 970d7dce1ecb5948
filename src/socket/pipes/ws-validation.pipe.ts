import { PipeTransform, Injectable, ArgumentMetadata, Logger } from '@nestjs/common';
import { validate } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { WsException } from '@nestjs/websockets';

type Constructor = new (...args: never[]) => object;

@Injectable()
export class WsValidationPipe implements PipeTransform<unknown> {
  private readonly logger = new Logger(WsValidationPipe.name);

  async transform(value: unknown, { metatype }: ArgumentMetadata) {
    // Primitives and untyped payloads pass through
    if (!metatype || !this.toValidate(metatype)) {
      return value;
    }

    const object: object = plainToInstance(metatype, value);

    const errors = await validate(object, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });

    if (errors.length > 0) {
      const messages = errors.map((error) => ({
        field: error.property,
        errors: Object.values(error.constraints ?? {}),
      }));

      this.logger.warn(`Validation failed: ${JSON.stringify(messages)}`);

      throw new WsException({
        code: 'VALIDATION_ERROR',
        message: 'Invalid payload',
        details: messages,
      });
    }

    return object;
  }

  private toValidate(metatype: Constructor): boolean {
    const types: Constructor[] = [String, Boolean, Number, Array, Object];
    return !types.includes(metatype);
  }
}
