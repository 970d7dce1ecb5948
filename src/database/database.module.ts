import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import databaseConfig from '../config/database.config';
import { TransactionHost } from './transaction-host';
import { TypeOrmTransactionHost } from './typeorm-transaction-host';

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule.forFeature(databaseConfig)],
      inject: [databaseConfig.KEY],
      useFactory: (config: ConfigType<typeof databaseConfig>) => ({
        type: 'postgres' as const,
        ...(config.url
          ? { url: config.url }
          : {
              host: config.host,
              port: config.port,
              username: config.username,
              password: config.password,
              database: config.name,
            }),
        autoLoadEntities: true,
        synchronize: config.synchronize,
        logging: config.logging,
      }),
    }),
  ],
  providers: [
    TypeOrmTransactionHost,
    { provide: TransactionHost, useExisting: TypeOrmTransactionHost },
  ],
  exports: [TypeOrmTransactionHost, TransactionHost],
})
export class DatabaseModule {}
