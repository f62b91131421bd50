import { z } from 'zod';

/**
 * A registered user as seen by the auth core.
 * The user store owns it; the core only holds transient (possibly cached) copies.
 */
export interface Principal {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  /** Most recently issued refresh token, or null when no session is open. */
  readonly refreshToken: string | null;
  readonly confirmed: boolean;
}

/**
 * Shape check for principals coming back from a cache or other serialized form.
 */
export const principalSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  passwordHash: z.string(),
  refreshToken: z.string().nullable(),
  confirmed: z.boolean(),
});
