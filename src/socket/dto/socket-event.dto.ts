import { IsNotEmpty, IsUUID } from 'class-validator';

export class ChatSubscriptionDto {
  @IsUUID()
  @IsNotEmpty()
  chatId!: string;
}

export type ChatSubscriptionAck =
  | { ok: true; chatId: string }
  | { ok: false; error: string };
