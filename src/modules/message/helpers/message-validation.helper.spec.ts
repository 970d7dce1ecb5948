import { describe, it, expect, beforeEach } from 'vitest';
import { MessageType } from '../../../common/enums/chat.enums';
import { ValidationError } from '../../../common/errors/chat-domain.errors';
import { MessageValidator, mediaContent } from './message-validation.helper';

describe('MessageValidator', () => {
  let validator: MessageValidator;

  beforeEach(() => {
    validator = new MessageValidator();
  });

  it('should keep text content as sent', () => {
    expect(validator.validate('TEXT', { content: ' hi ' })).toEqual({
      type: MessageType.TEXT,
      content: ' hi ',
      mediaUrl: null,
    });
  });

  it('should drop a media URL sent with text', () => {
    expect(
      validator.validate('text', {
        content: 'hi',
        mediaUrl: 'https://cdn.example.test/x.png',
      }).mediaUrl,
    ).toBeNull();
  });

  it.each([
    ['IMAGE', '📷 Photo'],
    ['VIDEO', '📹 Video'],
    ['VOICE', '🎤 Voice message'],
    ['AUDIO', '🎵 Audio'],
  ])('should caption %s media without content', (type, caption) => {
    const result = validator.validate(type, {
      mediaUrl: 'https://cdn.example.test/file',
    });

    expect(result.content).toBe(caption);
    expect(result.mediaUrl).toBe('https://cdn.example.test/file');
  });

  it('should keep a caption the sender wrote', () => {
    expect(
      validator.validate('IMAGE', {
        content: 'sunset',
        mediaUrl: 'https://cdn.example.test/s.jpg',
      }).content,
    ).toBe('sunset');
  });

  it('should require a media URL', () => {
    expect(() => validator.validate('VOICE', { mediaUrl: ' ' })).toThrow(
      new ValidationError('VOICE message must have a media URL'),
    );
  });

  it('should reject unknown and missing types', () => {
    expect(() => validator.validate('GIF', { content: 'x' })).toThrow(
      'Unsupported message type: GIF',
    );
    expect(() => validator.validate('', { content: 'x' })).toThrow(
      'Unsupported message type: ',
    );
  });

  it('should use a registered validator', () => {
    validator.register(
      MessageType.IMAGE,
      mediaContent(MessageType.IMAGE, '[image]'),
    );

    expect(
      validator.validate('IMAGE', { mediaUrl: 'https://cdn.example.test/i.png' })
        .content,
    ).toBe('[image]');
    expect(validator.supports(MessageType.IMAGE)).toBe(true);
  });
});
