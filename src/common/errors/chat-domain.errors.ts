import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Base exception for the chat core.
 * `kind` lets non-HTTP callers (socket acks, listeners) branch without
 * inspecting status codes.
 */
export abstract class ChatDomainException extends HttpException {
  abstract readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN' | 'CONFLICT';

  protected constructor(message: string, status: HttpStatus) {
    super(message, status);
  }
}

/** Malformed or contradictory input: wrong member count, blank field, unknown enum value. */
export class ValidationError extends ChatDomainException {
  readonly kind = 'VALIDATION' as const;

  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class NotFoundError extends ChatDomainException {
  readonly kind = 'NOT_FOUND' as const;

  constructor(message = 'Resource not found') {
    super(message, HttpStatus.NOT_FOUND);
  }
}

/**
 * Authenticated but not allowed. Also raised when the caller has no
 * membership at all, so existence is not disclosed.
 */
export class ForbiddenError extends ChatDomainException {
  readonly kind = 'FORBIDDEN' as const;

  constructor(message = 'Action not allowed') {
    super(message, HttpStatus.FORBIDDEN);
  }
}

export class ConflictError extends ChatDomainException {
  readonly kind = 'CONFLICT' as const;

  constructor(message: string) {
    super(message, HttpStatus.CONFLICT);
  }
}
