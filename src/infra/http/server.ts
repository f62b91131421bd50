import { AuthService } from '../../application/auth/authService.js';
import { ConfirmEmailUseCase } from '../../application/auth/confirmEmail.js';
import { LogEmailSender } from '../../application/auth/emailSender.js';
import { PasswordRecoveryUseCase } from '../../application/auth/passwordRecovery.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { RequestEmailConfirmationUseCase } from '../../application/auth/requestEmailConfirmation.js';
import { loadConfigFromEnvironment } from '../../config.js';
import { Argon2PasswordHasher } from '../../domain/auth/password.js';
import { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { createIdentityCache } from '../cache/createIdentityCache.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userRepo.js';
import { createLogger } from '../logger.js';
import { createApp } from './app.js';

const config = loadConfigFromEnvironment();
const logger = createLogger({ level: config.LOG_LEVEL });

if (!config.DATABASE_URL) {
  throw new Error('DATABASE_URL environment variable is required');
}

const pool = createPool(config.DATABASE_URL, logger);
const identityCache = createIdentityCache(config.REDIS_URL, logger);
const userStore = new PgUserStore(pool);
const passwordHasher = new Argon2PasswordHasher();
const tokenCodec = new TokenCodec({ secret: config.JWT_SECRET, algorithm: config.JWT_ALGORITHM });
const emailSender = new LogEmailSender(logger);

const authService = new AuthService(userStore, identityCache, passwordHasher, tokenCodec, logger, {
  accessToken: config.ACCESS_TOKEN_TTL,
  refreshToken: config.REFRESH_TOKEN_TTL,
  emailToken: config.EMAIL_TOKEN_TTL,
  identityCache: config.IDENTITY_CACHE_TTL,
});

const app = createApp({
  authService,
  register: new RegisterUseCase(
    userStore,
    passwordHasher,
    authService,
    emailSender,
    config.PUBLIC_BASE_URL,
    logger
  ),
  confirmEmail: new ConfirmEmailUseCase(userStore, authService),
  requestEmailConfirmation: new RequestEmailConfirmationUseCase(
    userStore,
    authService,
    emailSender,
    config.PUBLIC_BASE_URL,
    logger
  ),
  passwordRecovery: new PasswordRecoveryUseCase(
    userStore,
    passwordHasher,
    authService,
    emailSender,
    config.PUBLIC_BASE_URL,
    logger
  ),
  logger,
  healthCheck: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(config.PORT, () => {
  logger.info(`Server running on http://localhost:${config.PORT}`);
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await identityCache.close();
  await pool.end();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exitCode = 1;
    });
  });
}
