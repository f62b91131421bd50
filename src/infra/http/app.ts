import express from 'express';
import { AuthService } from '../../application/auth/authService.js';
import { ConfirmEmailUseCase } from '../../application/auth/confirmEmail.js';
import { PasswordRecoveryUseCase } from '../../application/auth/passwordRecovery.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { RequestEmailConfirmationUseCase } from '../../application/auth/requestEmailConfirmation.js';
import type { Logger } from '../logger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createUserRoutes } from './routes/users.js';

export interface AppDeps {
  authService: AuthService;
  register: RegisterUseCase;
  confirmEmail: ConfirmEmailUseCase;
  requestEmailConfirmation: RequestEmailConfirmationUseCase;
  passwordRecovery: PasswordRecoveryUseCase;
  logger: Logger;
  /** Resolves when backing services answer; rejects otherwise. */
  healthCheck?: () => Promise<void>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    const check = deps.healthCheck ? deps.healthCheck() : Promise.resolve();
    withTimeout(check, 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        deps.logger.warn({ err }, 'Health check failed');
        res.status(503).json({
          code: 'DEPENDENCY_UNAVAILABLE',
          message: 'Backing service unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());
  app.use('/api/auth', createAuthRoutes(deps));
  app.use('/api/users', createUserRoutes(deps.authService));

  // Error handler (must be last)
  app.use(errorHandler(deps.logger));

  return app;
}
