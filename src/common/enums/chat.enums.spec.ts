import 'reflect-metadata';
import { describe, it, expect } from 'vitest';
import { getMetadataArgsStorage } from 'typeorm';
import { Chat } from '../../modules/chat/entities/chat.entity';
import { ChatMember } from '../../modules/chat/entities/chat-member.entity';
import { Message } from '../../modules/message/entities/message.entity';
import { ChatType, MemberRole, MessageType, parseEnumValue } from './chat.enums';

function columnOf(target: object, propertyName: string) {
  return getMetadataArgsStorage().columns.find(
    (column) => column.target === target && column.propertyName === propertyName,
  );
}

describe('chat enums', () => {
  describe('parseEnumValue', () => {
    it('should match case-insensitively and trim', () => {
      expect(parseEnumValue(MemberRole, ' admin ')).toBe(MemberRole.ADMIN);
      expect(parseEnumValue(ChatType, 'p2p')).toBe(ChatType.P2P);
    });

    it('should return undefined for unknown or empty input', () => {
      expect(parseEnumValue(MessageType, 'STICKER')).toBeUndefined();
      expect(parseEnumValue(MessageType, '')).toBeUndefined();
      expect(parseEnumValue(MessageType, null)).toBeUndefined();
    });
  });

  describe('persistence', () => {
    it.each([
      { entity: Chat, property: 'type', enumName: 'chat_type' },
      { entity: ChatMember, property: 'role', enumName: 'member_role' },
      { entity: Message, property: 'type', enumName: 'message_type' },
    ])(
      'should store $property as the postgres enum $enumName',
      ({ entity, property, enumName }) => {
        const column = columnOf(entity, property);

        expect(column?.options.type).toBe('enum');
        expect(column?.options.enumName).toBe(enumName);
      },
    );
  });
});
