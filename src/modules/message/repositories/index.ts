export * from './message.repository.interface';
export { TypeOrmMessageRepository } from './typeorm-message.repository';
