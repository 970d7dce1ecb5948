import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ChatType } from '../../../common/enums/chat.enums';
import { ChatMember } from './chat-member.entity';

@Entity({ name: 'chats' })
export class Chat {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'enum', enum: ChatType, enumName: 'chat_type' })
  type!: ChatType;

  @Column({ name: 'group_name', type: 'varchar', length: 100, nullable: true })
  groupName!: string | null;

  @Column({ name: 'group_image', type: 'varchar', nullable: true })
  groupImage!: string | null;

  @Column({ name: 'is_deleted', default: false })
  isDeleted!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'deleted_at', type: 'timestamptz', nullable: true })
  deletedAt!: Date | null;

  @OneToMany(() => ChatMember, (member) => member.chat)
  members?: ChatMember[];
}
