export * from './contact.repository.interface';
export { TypeOrmContactRepository } from './typeorm-contact.repository';
