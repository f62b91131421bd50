import { AuthError } from '../../domain/auth/errors.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import type { Logger } from '../../infra/logger.js';
import { InvalidEmailTokenError } from '../errors.js';
import { AuthService } from './authService.js';
import { EmailSender } from './emailSender.js';
import { passwordResetLink } from './links.js';
import { UserStore } from './userStore.js';

export interface ResetPasswordCommand {
  token: string;
  password: string;
}

export class PasswordRecoveryUseCase {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private authService: AuthService,
    private emailSender: EmailSender,
    private baseUrl: string,
    private logger: Logger
  ) {}

  /**
   * Mail a reset link if the account exists. Callers get no signal either way.
   */
  async request(email: string): Promise<void> {
    const user = await this.userStore.findByEmail(email);
    if (!user) {
      this.logger.debug({ email }, 'Password reset requested for unknown email');
      return;
    }

    const token = this.authService.issueSinglePurposeToken(user.email, 'password_reset');
    await this.emailSender.sendPasswordReset(user.email, passwordResetLink(this.baseUrl, token));
  }

  /**
   * Set a new password from a reset token and end every open session.
   */
  async reset(command: ResetPasswordCommand): Promise<void> {
    let email: string;
    try {
      email = this.authService.consumeSinglePurposeToken(command.token, 'password_reset');
    } catch (error) {
      if (error instanceof AuthError) {
        throw new InvalidEmailTokenError('Invalid token for password reset');
      }
      throw error;
    }

    const user = await this.userStore.findByEmail(email);
    if (!user) {
      throw new InvalidEmailTokenError('Invalid token for password reset');
    }

    const passwordHash = await this.passwordHasher.hash(command.password);
    await this.userStore.save({ ...user, passwordHash });
    await this.authService.revokeSessions(email);
    this.logger.info({ email }, 'Password reset; sessions revoked');
  }
}
