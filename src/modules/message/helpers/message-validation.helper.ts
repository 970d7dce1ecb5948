import { Injectable } from '@nestjs/common';
import { MessageType, parseEnumValue } from '../../../common/enums/chat.enums';
import { ValidationError } from '../../../common/errors/chat-domain.errors';

export interface MessageContentInput {
  content?: string | null;
  mediaUrl?: string | null;
}

export interface ValidatedContent {
  content: string;
  mediaUrl: string | null;
}

/**
 * Checks one message type's payload and returns what gets persisted.
 * Throws ValidationError on a malformed payload.
 */
export type MessageContentValidator = (
  input: MessageContentInput,
) => ValidatedContent;

/** The value when it has non-whitespace characters, otherwise undefined. */
function nonBlank(value: string | null | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

export const textContent: MessageContentValidator = (input) => {
  const content = nonBlank(input.content);
  if (!content) {
    throw new ValidationError('TEXT message must have non-empty content');
  }
  return { content, mediaUrl: null };
};

/**
 * Media messages need a URL; the caption falls back to `defaultCaption`.
 */
export function mediaContent(
  type: MessageType,
  defaultCaption: string,
): MessageContentValidator {
  return (input) => {
    const mediaUrl = nonBlank(input.mediaUrl);
    if (!mediaUrl) {
      throw new ValidationError(`${type} message must have a media URL`);
    }
    return {
      content: nonBlank(input.content) ?? defaultCaption,
      mediaUrl,
    };
  };
}

export const DEFAULT_CONTENT_VALIDATORS: ReadonlyArray<
  [MessageType, MessageContentValidator]
> = [
  [MessageType.TEXT, textContent],
  [MessageType.IMAGE, mediaContent(MessageType.IMAGE, '📷 Photo')],
  [MessageType.VIDEO, mediaContent(MessageType.VIDEO, '📹 Video')],
  [MessageType.VOICE, mediaContent(MessageType.VOICE, '🎤 Voice message')],
  [MessageType.AUDIO, mediaContent(MessageType.AUDIO, '🎵 Audio')],
];

/**
 * Registry of content validators keyed by message type.
 * Supporting a new type means registering one more validator.
 */
@Injectable()
export class MessageValidator {
  private readonly validators = new Map<MessageType, MessageContentValidator>(
    DEFAULT_CONTENT_VALIDATORS,
  );

  register(type: MessageType, validator: MessageContentValidator): void {
    this.validators.set(type, validator);
  }

  supports(type: MessageType): boolean {
    return this.validators.has(type);
  }

  validate(
    rawType: string,
    input: MessageContentInput,
  ): ValidatedContent & { type: MessageType } {
    const type = parseEnumValue(MessageType, rawType);
    const validator = type ? this.validators.get(type) : undefined;
    if (!type || !validator) {
      throw new ValidationError(`Unsupported message type: ${rawType}`);
    }
    return { type, ...validator(input) };
  }
}
