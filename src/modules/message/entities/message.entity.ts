import {
  Column,
  Entity,
  Generated,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  ValueTransformer,
} from 'typeorm';
import { MessageType } from '../../../common/enums/chat.enums';
import { Chat } from '../../chat/entities/chat.entity';
import { User } from '../../users/entities/user.entity';

// pg returns int8 as string; sequence values stay far below 2^53
const bigintToNumber: ValueTransformer = {
  to: (value: number | undefined) => value,
  from: (value: string | null) => (value === null ? 0 : Number(value)),
};

@Entity({ name: 'messages' })
@Index('idx_messages_chat_order', ['chatId', 'sentAt', 'seq'])
export class Message {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'chat_id', type: 'uuid' })
  chatId!: string;

  @Column({ name: 'sender_id', type: 'uuid' })
  senderId!: string;

  @Column({ type: 'enum', enum: MessageType, enumName: 'message_type' })
  type!: MessageType;

  @Column({ type: 'text' })
  content!: string;

  @Column({ name: 'media_url', type: 'varchar', nullable: true })
  mediaUrl!: string | null;

  @Column({ name: 'sent_at', type: 'timestamptz' })
  sentAt!: Date;

  // Tie-breaker for messages sharing a sentAt
  @Column({ type: 'bigint', transformer: bigintToNumber })
  @Generated('increment')
  seq!: number;

  @Column({ name: 'is_edited', default: false })
  isEdited!: boolean;

  @Column({ name: 'is_deleted', default: false })
  isDeleted!: boolean;

  @ManyToOne(() => Chat, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'chat_id' })
  chat?: Chat;

  @ManyToOne(() => User)
  @JoinColumn({ name: 'sender_id' })
  sender?: User;
}
