export * from './chat.repository.interface';
export { TypeOrmChatRepository } from './typeorm-chat.repository';
