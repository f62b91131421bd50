import { describe, it, expect, beforeEach } from 'vitest';
import { AuthService } from '../authService.js';
import { RegisterUseCase } from '../register.js';
import { ConfirmEmailUseCase } from '../confirmEmail.js';
import { RequestEmailConfirmationUseCase } from '../requestEmailConfirmation.js';
import { PasswordRecoveryUseCase } from '../passwordRecovery.js';
import { ConflictError, InvalidEmailTokenError } from '../../errors.js';
import { InvalidCredentialsError, RevokedTokenError } from '../../../domain/auth/errors.js';
import { Argon2PasswordHasher } from '../../../domain/auth/password.js';
import { TokenCodec } from '../../../domain/auth/tokenCodec.js';
import { MemoryIdentityCache } from '../../../infra/cache/memoryIdentityCache.js';
import { createLogger } from '../../../infra/logger.js';
import { InMemoryUserStore, ManualClock, RecordingEmailSender, tokenFromLink } from './fakes.js';

const BASE_URL = 'http://localhost:3000/';

describe('account flows', () => {
  const hasher = new Argon2PasswordHasher({ timeCost: 2, memoryCost: 4096 });
  const logger = createLogger({ level: 'silent' });

  let clock: ManualClock;
  let store: InMemoryUserStore;
  let cache: MemoryIdentityCache;
  let mail: RecordingEmailSender;
  let authService: AuthService;
  let register: RegisterUseCase;
  let confirmEmail: ConfirmEmailUseCase;
  let requestConfirmation: RequestEmailConfirmationUseCase;
  let recovery: PasswordRecoveryUseCase;

  beforeEach(() => {
    clock = new ManualClock();
    store = new InMemoryUserStore();
    cache = new MemoryIdentityCache(clock.now);
    mail = new RecordingEmailSender();
    const codec = new TokenCodec({ secret: 'test-secret', algorithm: 'HS512', now: clock.now });
    authService = new AuthService(store, cache, hasher, codec, logger);
    register = new RegisterUseCase(store, hasher, authService, mail, BASE_URL, logger);
    confirmEmail = new ConfirmEmailUseCase(store, authService);
    requestConfirmation = new RequestEmailConfirmationUseCase(
      store,
      authService,
      mail,
      BASE_URL,
      logger
    );
    recovery = new PasswordRecoveryUseCase(store, hasher, authService, mail, BASE_URL, logger);
  });

  const signUp = () =>
    register.execute({ username: 'alice', email: 'a@x.com', password: 'correctpw' });

  describe('RegisterUseCase', () => {
    it('should create an unconfirmed user with a hashed password', async () => {
      const result = await signUp();

      expect(result).toMatchObject({ username: 'alice', email: 'a@x.com', confirmed: false });
      const stored = store.users.get('a@x.com');
      expect(stored?.passwordHash).not.toBe('correctpw');
      expect(await hasher.verify('correctpw', stored?.passwordHash ?? '')).toBe(true);
    });

    it('should mail a verification link', async () => {
      await signUp();

      expect(mail.sent).toHaveLength(1);
      expect(mail.sent[0].kind).toBe('verification');
      expect(mail.sent[0].to).toBe('a@x.com');
      expect(mail.sent[0].link.startsWith('http://localhost:3000/api/auth/confirmed_email/')).toBe(
        true
      );
    });

    it('should reject a duplicate email', async () => {
      await signUp();

      await expect(signUp()).rejects.toThrow(ConflictError);
    });

    it('should keep the account when the verification email fails', async () => {
      mail.sendVerification = async () => {
        throw new Error('smtp down');
      };

      const result = await signUp();

      expect(result.email).toBe('a@x.com');
      expect(store.users.has('a@x.com')).toBe(true);
    });
  });

  describe('ConfirmEmailUseCase', () => {
    it('should confirm the email from the mailed token', async () => {
      await signUp();
      const token = tokenFromLink(mail.sent[0].link);

      const result = await confirmEmail.execute(token);

      expect(result).toEqual({ email: 'a@x.com', alreadyConfirmed: false });
      expect(store.users.get('a@x.com')?.confirmed).toBe(true);
    });

    it('should report an already confirmed email', async () => {
      await signUp();
      const token = tokenFromLink(mail.sent[0].link);
      await confirmEmail.execute(token);

      expect(await confirmEmail.execute(token)).toEqual({
        email: 'a@x.com',
        alreadyConfirmed: true,
      });
    });

    it('should replace a stale cached identity', async () => {
      await signUp();
      const { accessToken } = await authService.login('a@x.com', 'correctpw');
      expect((await authService.resolvePrincipal(accessToken)).confirmed).toBe(false);

      await confirmEmail.execute(tokenFromLink(mail.sent[0].link));

      expect((await authService.resolvePrincipal(accessToken)).confirmed).toBe(true);
    });

    it('should reject access tokens and garbage as invalid email tokens', async () => {
      await signUp();
      const { accessToken } = await authService.login('a@x.com', 'correctpw');

      await expect(confirmEmail.execute(accessToken)).rejects.toThrow(InvalidEmailTokenError);
      await expect(confirmEmail.execute('garbage')).rejects.toThrow(InvalidEmailTokenError);
    });

    it('should reject a token for an email with no account', async () => {
      const token = authService.issueSinglePurposeToken('ghost@x.com', 'email_verification');

      await expect(confirmEmail.execute(token)).rejects.toThrow('Verification error');
    });

    it('should reject an expired token', async () => {
      await signUp();
      clock.advanceSeconds(24 * 60 * 60);

      await expect(confirmEmail.execute(tokenFromLink(mail.sent[0].link))).rejects.toThrow(
        InvalidEmailTokenError
      );
    });
  });

  describe('RequestEmailConfirmationUseCase', () => {
    it('should resend the verification email', async () => {
      await signUp();

      expect(await requestConfirmation.execute('a@x.com')).toBe('sent');
      expect(mail.sent).toHaveLength(2);
      expect(mail.sent[1].kind).toBe('verification');
    });

    it('should not mail a confirmed user', async () => {
      await signUp();
      await confirmEmail.execute(tokenFromLink(mail.sent[0].link));

      expect(await requestConfirmation.execute('a@x.com')).toBe('already_confirmed');
      expect(mail.sent).toHaveLength(1);
    });

    it('should answer unknown emails like a successful send', async () => {
      expect(await requestConfirmation.execute('nobody@x.com')).toBe('sent');
      expect(mail.sent).toHaveLength(0);
    });
  });

  describe('PasswordRecoveryUseCase', () => {
    it('should mail a reset link to existing users only', async () => {
      await signUp();

      await recovery.request('a@x.com');
      await recovery.request('nobody@x.com');

      const resets = mail.sent.filter((m) => m.kind === 'password_reset');
      expect(resets).toHaveLength(1);
      expect(resets[0].link.startsWith('http://localhost:3000/reset-password?token=')).toBe(true);
    });

    it('should set the new password and revoke open sessions', async () => {
      await signUp();
      const session = await authService.login('a@x.com', 'correctpw');
      await recovery.request('a@x.com');
      const token = tokenFromLink(mail.sent[1].link);

      await recovery.reset({ token, password: 'newpassword' });

      await expect(authService.login('a@x.com', 'correctpw')).rejects.toThrow(
        InvalidCredentialsError
      );
      await expect(authService.refresh(session.refreshToken)).rejects.toThrow(RevokedTokenError);
      const fresh = await authService.login('a@x.com', 'newpassword');
      expect(fresh.tokenType).toBe('bearer');
    });

    it('should not accept a verification token as a reset token', async () => {
      await signUp();
      const token = tokenFromLink(mail.sent[0].link);

      await expect(recovery.reset({ token, password: 'newpassword' })).rejects.toThrow(
        'Invalid token for password reset'
      );
    });
  });
});
