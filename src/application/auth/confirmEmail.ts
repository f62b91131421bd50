import { AuthError } from '../../domain/auth/errors.js';
import { InvalidEmailTokenError } from '../errors.js';
import { AuthService } from './authService.js';
import { UserStore } from './userStore.js';

export interface ConfirmEmailResult {
  email: string;
  alreadyConfirmed: boolean;
}

export class ConfirmEmailUseCase {
  constructor(
    private userStore: UserStore,
    private authService: AuthService
  ) {}

  async execute(token: string): Promise<ConfirmEmailResult> {
    const email = consumeOrReject(this.authService, token);

    const user = await this.userStore.findByEmail(email);
    if (!user) {
      throw new InvalidEmailTokenError('Verification error');
    }

    if (user.confirmed) {
      return { email, alreadyConfirmed: true };
    }

    await this.userStore.save({ ...user, confirmed: true });
    await this.authService.invalidateIdentity(email);

    return { email, alreadyConfirmed: false };
  }
}

function consumeOrReject(authService: AuthService, token: string): string {
  try {
    return authService.consumeSinglePurposeToken(token, 'email_verification');
  } catch (error) {
    if (error instanceof AuthError) {
      throw new InvalidEmailTokenError();
    }
    throw error;
  }
}
