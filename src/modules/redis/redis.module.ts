import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RedisService } from './redis.service';
import { CacheService } from './services/cache.service';

import redisConfig from '../../config/redis.config';
import cacheConfig from '../../config/cache.config';

@Global()
@Module({
  imports: [
    ConfigModule.forFeature(redisConfig),
    ConfigModule.forFeature(cacheConfig),
  ],
  providers: [RedisService, CacheService],
  exports: [RedisService, CacheService],
})
export class RedisModule {}
