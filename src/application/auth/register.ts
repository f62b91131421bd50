import { PasswordHasher } from '../../domain/auth/password.js';
import type { Logger } from '../../infra/logger.js';
import { ConflictError } from '../errors.js';
import { AuthService } from './authService.js';
import { EmailSender } from './emailSender.js';
import { verificationLink } from './links.js';
import { UserStore } from './userStore.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
}

export interface RegisterResult {
  userId: string;
  username: string;
  email: string;
  confirmed: boolean;
}

export class RegisterUseCase {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private authService: AuthService,
    private emailSender: EmailSender,
    private baseUrl: string,
    private logger: Logger
  ) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const existing = await this.userStore.findByEmail(command.email);
    if (existing) {
      throw new ConflictError('Account already exists');
    }

    const passwordHash = await this.passwordHasher.hash(command.password);
    const user = await this.userStore.create({
      username: command.username,
      email: command.email,
      passwordHash,
    });

    const token = this.authService.issueSinglePurposeToken(user.email, 'email_verification');
    // The account exists either way; a failed send can be retried via request_email
    try {
      await this.emailSender.sendVerification(
        user.email,
        user.username,
        verificationLink(this.baseUrl, token)
      );
    } catch (error) {
      this.logger.error({ err: error, email: user.email }, 'Failed to send verification email');
    }

    return {
      userId: user.id,
      username: user.username,
      email: user.email,
      confirmed: user.confirmed,
    };
  }
}
