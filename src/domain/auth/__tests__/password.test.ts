import { describe, it, expect } from 'vitest';
import { Argon2PasswordHasher } from '../password.js';

describe('Argon2PasswordHasher', () => {
  const hasher = new Argon2PasswordHasher({ timeCost: 2, memoryCost: 4096 });

  it('should verify a password against its own hash', async () => {
    const hash = await hasher.hash('correctpw');

    expect(await hasher.verify('correctpw', hash)).toBe(true);
  });

  it('should reject a different password', async () => {
    const hash = await hasher.hash('correctpw');

    expect(await hasher.verify('wrongpw', hash)).toBe(false);
  });

  it('should produce a self-describing argon2id hash', async () => {
    const hash = await hasher.hash('correctpw');

    expect(hash.startsWith('$argon2id$')).toBe(true);
    expect(hash).toContain('m=4096,t=2');
  });

  it('should salt every hash differently', async () => {
    const first = await hasher.hash('same-password');
    const second = await hasher.hash('same-password');

    expect(first).not.toBe(second);
    expect(await hasher.verify('same-password', first)).toBe(true);
    expect(await hasher.verify('same-password', second)).toBe(true);
  });

  it('should return false instead of throwing on malformed hashes', async () => {
    await expect(hasher.verify('correctpw', 'not-a-hash')).resolves.toBe(false);
    await expect(hasher.verify('correctpw', '')).resolves.toBe(false);
    await expect(hasher.verify('correctpw', '$argon2id$v=19$broken')).resolves.toBe(false);
  });

  it('should verify hashes made with other cost settings', async () => {
    const stronger = new Argon2PasswordHasher({ timeCost: 3, memoryCost: 8192 });
    const hash = await stronger.hash('correctpw');

    expect(await hasher.verify('correctpw', hash)).toBe(true);
  });
});
