import { registerAs } from '@nestjs/config';

/**
 * Tokens are issued elsewhere; this service only verifies them.
 */
export default registerAs('jwt', () => ({
  accessToken: {
    secret:
      process.env.JWT_ACCESS_SECRET ||
      'access-token-secret-change-in-production',
  },
}));
