import { registerAs } from '@nestjs/config';

export default registerAs('cache', () => ({
  // Chat lists, member lists and contact lists share one TTL
  ttlSeconds: parseInt(process.env.CACHE_TTL_SECONDS ?? '', 10) || 600,
}));
