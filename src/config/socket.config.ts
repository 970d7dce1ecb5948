import { registerAs } from '@nestjs/config';

export default registerAs('socket', () => ({
  // Comma separated, '*' allows any origin
  corsOrigins: (process.env.CORS_ORIGINS || '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0),

  pingInterval: parseInt(process.env.PING_INTERVAL ?? '', 10) || 25000,
  pingTimeout: parseInt(process.env.PING_TIMEOUT ?? '', 10) || 20000,

  // Server identifier (for multi-instance deployment)
  serverInstance:
    process.env.SERVER_INSTANCE || `server-${process.env.HOSTNAME || 'local'}`,
}));
