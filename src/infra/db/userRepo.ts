import type { Pool } from 'pg';
import { NewPrincipal, UserStore } from '../../application/auth/userStore.js';
import { Principal } from '../../domain/auth/principal.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  refresh_token: string | null;
  confirmed: boolean;
}

const USER_COLUMNS = 'id, username, email, password_hash, refresh_token, confirmed';

function toPrincipal(row: UserRow): Principal {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    refreshToken: row.refresh_token,
    confirmed: row.confirmed,
  };
}

export class PgUserStore implements UserStore {
  constructor(private readonly pool: Pool) {}

  async findByEmail(email: string): Promise<Principal | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    const row = result.rows[0];
    return row ? toPrincipal(row) : null;
  }

  async create(input: NewPrincipal): Promise<Principal> {
    const result = await this.pool.query<UserRow>(
      `INSERT INTO users (username, email, password_hash)
       VALUES ($1, $2, $3)
       RETURNING ${USER_COLUMNS}`,
      [input.username, input.email, input.passwordHash]
    );

    return toPrincipal(result.rows[0]);
  }

  async save(principal: Principal): Promise<void> {
    await this.pool.query(
      `UPDATE users
       SET username = $2, password_hash = $3, confirmed = $4
       WHERE id = $1`,
      [principal.id, principal.username, principal.passwordHash, principal.confirmed]
    );
  }

  async setRefreshToken(email: string, token: string | null): Promise<void> {
    await this.pool.query('UPDATE users SET refresh_token = $2 WHERE email = $1', [email, token]);
  }

  /**
   * Single-row conditional UPDATE: the row lock serialises concurrent swaps,
   * and the loser re-evaluates the WHERE clause against the winner's value.
   */
  async compareAndSetRefreshToken(
    email: string,
    expected: string,
    next: string | null
  ): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE users
       SET refresh_token = $3
       WHERE email = $1 AND refresh_token = $2`,
      [email, expected, next]
    );

    return result.rowCount === 1;
  }
}
