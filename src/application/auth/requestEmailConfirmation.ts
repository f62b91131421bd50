import type { Logger } from '../../infra/logger.js';
import { AuthService } from './authService.js';
import { EmailSender } from './emailSender.js';
import { verificationLink } from './links.js';
import { UserStore } from './userStore.js';

export type RequestEmailConfirmationResult = 'sent' | 'already_confirmed';

/**
 * Resend the verification email. Unknown emails get the same answer as a
 * successful send so the endpoint cannot be used to discover which accounts exist.
 */
export class RequestEmailConfirmationUseCase {
  constructor(
    private userStore: UserStore,
    private authService: AuthService,
    private emailSender: EmailSender,
    private baseUrl: string,
    private logger: Logger
  ) {}

  async execute(email: string): Promise<RequestEmailConfirmationResult> {
    const user = await this.userStore.findByEmail(email);
    if (!user) {
      this.logger.debug({ email }, 'Confirmation requested for unknown email');
      return 'sent';
    }

    if (user.confirmed) {
      return 'already_confirmed';
    }

    const token = this.authService.issueSinglePurposeToken(user.email, 'email_verification');
    await this.emailSender.sendVerification(
      user.email,
      user.username,
      verificationLink(this.baseUrl, token)
    );
    return 'sent';
  }
}
