import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
  Inject,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import redisConfig from '../../config/redis.config';

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private readonly client: Redis;

  constructor(
    @Inject(redisConfig.KEY)
    private readonly config: ConfigType<typeof redisConfig>,
  ) {
    // ioredis starts connecting as soon as the instance exists
    const options: RedisOptions = {
      host: this.config.host,
      port: this.config.port,
      password: this.config.password,
      db: this.config.db,
      maxRetriesPerRequest: this.config.maxRetriesPerRequest,
      enableReadyCheck: this.config.enableReadyCheck,
      enableOfflineQueue: this.config.enableOfflineQueue,
      retryStrategy: this.config.retryStrategy,
      connectTimeout: this.config.connectTimeout,
      commandTimeout: this.config.commandTimeout,
    };

    this.logger.log(
      `Initializing Redis client (${this.config.host}:${this.config.port}/${this.config.db})`,
    );

    this.client = new Redis(options);
    this.setupEventHandlers(this.client, 'Client');
  }

  async onModuleInit() {
    try {
      await this.waitForReady(this.client, 'Client');
      this.logger.log('✅ Redis connection established and ready');
    } catch (error) {
      this.logger.error(
        '❌ Failed to connect to Redis',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  async onModuleDestroy() {
    this.logger.log('Disconnecting Redis client...');
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }

  private setupEventHandlers(client: Redis, name: string): void {
    client.on('ready', () => {
      this.logger.log(`Redis ${name}: Ready`);
    });

    client.on('error', (error: NodeJS.ErrnoException) => {
      // Avoid a stack trace per retry while the server is down
      if (error.code === 'ECONNREFUSED') {
        this.logger.warn(`Redis ${name}: Connection refused. Retrying...`);
        return;
      }
      this.logger.error(`Redis ${name} Error:`, error.stack);
    });

    client.on('reconnecting', () => {
      this.logger.warn(`Redis ${name}: Reconnecting...`);
    });

    client.on('end', () => {
      this.logger.warn(`Redis ${name}: Connection ended`);
    });
  }

  private waitForReady(client: Redis, name: string): Promise<void> {
    if (client.status === 'ready') return Promise.resolve();

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error(`Redis ${name} connection timeout`));
      }, this.config.connectTimeout);

      client.once('ready', () => {
        clearTimeout(timeout);
        resolve();
      });

      client.once('error', (error) => {
        clearTimeout(timeout);
        reject(error);
      });
    });
  }

  getClient(): Redis {
    return this.client;
  }
}
