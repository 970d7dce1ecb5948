export * from './user.repository.interface';
export { TypeOrmUserRepository } from './typeorm-user.repository';
