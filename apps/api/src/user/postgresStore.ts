import {
  IdentifierSet,
  KIND_EMAIL,
  kindOf,
  type Identifier,
  type NamespaceAndKind,
  type PreferenceMap
} from "@hookrelay/shared";
import type { DbClient } from "../data/db.js";
import { query } from "../data/db.js";
import { ambiguousUserError, UserNotFoundError, type UserStore } from "./store.js";
import type { User } from "./user.js";

type UserRow = {
  key: string;
  preferences: PreferenceMap | null;
  identifiers: Record<NamespaceAndKind, string> | null;
};

const selectUser = `SELECT key, preferences, identifiers FROM users`;

function toUser(row: UserRow): User {
  return {
    key: row.key,
    preferences: row.preferences ?? {},
    identifiers: IdentifierSet.fromMap(row.identifiers ?? {})
  };
}

function containment(id: Identifier): string {
  return JSON.stringify({ [id.namespaceAndKind]: id.value });
}

function emailsOf(ids: IdentifierSet): string[] {
  return ids
    .toList()
    .filter((id) => kindOf(id.namespaceAndKind) === KIND_EMAIL)
    .map((id) => id.value);
}

/**
 * Users in the `users` table (db/migrations/001_users.sql). Identifiers are stored as a
 * JSON object keyed by NamespaceAndKind, with every email-kind value copied into
 * `emails` for the email fallback.
 */
export class PostgresUserStore implements UserStore {
  constructor(private readonly client: DbClient) {}

  /** Inserts the user, or replaces the stored one with the same key. */
  async add(user: User, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await query(
      this.client,
      `
        INSERT INTO users (key, preferences, identifiers, emails)
        VALUES ($1, $2::jsonb, $3::jsonb, $4::jsonb)
        ON CONFLICT (key) DO UPDATE SET
          preferences = EXCLUDED.preferences,
          identifiers = EXCLUDED.identifiers,
          emails = EXCLUDED.emails,
          updated_at = now()
      `,
      [
        user.key,
        JSON.stringify(user.preferences),
        JSON.stringify(user.identifiers.toMap()),
        JSON.stringify(emailsOf(user.identifiers))
      ]
    );
  }

  async get(key: string, signal: AbortSignal): Promise<User> {
    signal.throwIfAborted();
    const { rows } = await query<UserRow>(this.client, `${selectUser} WHERE key = $1`, [key]);
    const row = rows[0];
    if (!row) throw new UserNotFoundError();
    return toUser(row);
  }

  async getByIdentifier(id: Identifier, signal: AbortSignal): Promise<User> {
    signal.throwIfAborted();
    const exact = await query<UserRow>(
      this.client,
      `${selectUser} WHERE identifiers @> $1::jsonb LIMIT 2`,
      [containment(id)]
    );
    if (exact.rows.length > 1) throw ambiguousUserError(id, exact.rows.length);
    if (exact.rows.length === 1) return toUser(exact.rows[0]);

    if (kindOf(id.namespaceAndKind) !== KIND_EMAIL) throw new UserNotFoundError();
    signal.throwIfAborted();
    const byEmail = await query<UserRow>(
      this.client,
      `${selectUser} WHERE emails @> $1::jsonb LIMIT 2`,
      [JSON.stringify([id.value])]
    );
    if (byEmail.rows.length > 1) throw ambiguousUserError(id, byEmail.rows.length);
    if (byEmail.rows.length === 1) return toUser(byEmail.rows[0]);
    throw new UserNotFoundError();
  }

  async find(candidates: IdentifierSet, signal: AbortSignal): Promise<User> {
    const ids = candidates.toList();
    if (ids.length === 0) {
      throw new UserNotFoundError("user not found: no identifiers provided");
    }

    signal.throwIfAborted();
    const exact = await query<UserRow>(
      this.client,
      `${selectUser} WHERE identifiers @> ANY($1::jsonb[]) LIMIT 2`,
      [ids.map(containment)]
    );
    if (exact.rows.length > 1) {
      throw new UserNotFoundError(
        `user not found: multiple users match ${candidates.toString()}`
      );
    }
    if (exact.rows.length === 1) return toUser(exact.rows[0]);

    const emails = [...new Set(emailsOf(candidates))];
    if (emails.length === 0) {
      throw new UserNotFoundError(
        "user not found: no identifiers matched and no fallback emails were available"
      );
    }

    signal.throwIfAborted();
    const byEmail = await query<UserRow>(
      this.client,
      `${selectUser} WHERE emails ?| $1::text[] LIMIT 2`,
      [emails]
    );
    if (byEmail.rows.length > 1) {
      throw new UserNotFoundError(
        `user not found: multiple users match emails ${emails.join(", ")}`
      );
    }
    if (byEmail.rows.length === 1) return toUser(byEmail.rows[0]);
    throw new UserNotFoundError();
  }

  async setPreferences(
    key: string,
    preferences: PreferenceMap,
    signal: AbortSignal
  ): Promise<void> {
    signal.throwIfAborted();
    const { rowCount } = await query(
      this.client,
      `UPDATE users SET preferences = $2::jsonb, updated_at = now() WHERE key = $1`,
      [key, JSON.stringify(preferences)]
    );
    if (!rowCount) throw new UserNotFoundError();
  }

  /** Connectivity probe run before the server accepts traffic. */
  async validate(signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    await query(this.client, `SELECT 1`);
  }
}
