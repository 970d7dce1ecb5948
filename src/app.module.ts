import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ClsModule } from 'nestjs-cls';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { DatabaseModule } from './database/database.module';
import { RedisModule } from './modules/redis/redis.module';
import { EventsModule } from './shared/events/events.module';
import { IdentityModule } from './modules/identity/identity.module';
import { UsersModule } from './modules/users/users.module';
import { ChatModule } from './modules/chat/chat.module';
import { MessageModule } from './modules/message/message.module';
import { ContactModule } from './modules/contact/contact.module';
import { SocketModule } from './socket/socket.module';

// Configs
import databaseConfig from './config/database.config';
import redisConfig from './config/redis.config';
import cacheConfig from './config/cache.config';
import jwtConfig from './config/jwt.config';
import socketConfig from './config/socket.config';

@Module({
  imports: [
    // ========================================================================
    // 1. INFRASTRUCTURE & CONFIGURATION
    // ========================================================================
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, redisConfig, cacheConfig, jwtConfig, socketConfig],
      envFilePath: ['.env.local', '.env'],
    }),

    EventEmitterModule.forRoot({
      global: true,
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),

    // Carries the transactional EntityManager across service calls
    ClsModule.forRoot({
      global: true,
      middleware: { mount: true },
    }),

    // ========================================================================
    // 2. CORE MODULES
    // ========================================================================
    DatabaseModule,
    RedisModule,
    EventsModule,

    // ========================================================================
    // 3. FEATURE MODULES
    // ========================================================================
    IdentityModule,
    UsersModule,
    ChatModule,
    MessageModule,
    ContactModule,

    // Real-time edge
    SocketModule,
  ],
})
export class AppModule {}
