import {
  KIND_EMAIL,
  copyPreferences,
  formatIdentifier,
  kindOf,
  type Identifier,
  type IdentifierSet,
  type PreferenceMap
} from "@hookrelay/shared";
import { AppError } from "../errors.js";
import { copyUser, type User } from "./user.js";

/**
 * Lookup and lookup failures alike: no single user matched. Ambiguous matches are
 * reported this way too, so one user's data never leaks to another.
 */
export class UserNotFoundError extends AppError {
  constructor(message = "user not found") {
    super("USER_NOT_FOUND", 404, message);
    this.name = "UserNotFoundError";
  }
}

export function ambiguousUserError(id: Identifier, count: number): UserNotFoundError {
  return new UserNotFoundError(
    `user not found: ${formatIdentifier(id)} matches ${count} users`
  );
}

export function isUserNotFound(err: unknown): err is UserNotFoundError {
  return err instanceof UserNotFoundError;
}

/**
 * Where users live. Identifier lookups match exactly first; when nothing matches an
 * email-kind identifier, any user with an email-kind identifier of the same value (in
 * any namespace) matches instead.
 */
export interface UserStore {
  get(key: string, signal: AbortSignal): Promise<User>;
  getByIdentifier(id: Identifier, signal: AbortSignal): Promise<User>;
  /** The user matching any one of the candidates, tried in key order. */
  find(candidates: IdentifierSet, signal: AbortSignal): Promise<User>;
  /** Replaces the user's stored preferences. */
  setPreferences(key: string, preferences: PreferenceMap, signal: AbortSignal): Promise<void>;
}

/** Suited to tests and small deployments that need no durable preferences. */
export class InMemoryUserStore implements UserStore {
  private readonly users: User[];

  constructor(users: Iterable<User> = []) {
    this.users = [...users].map(copyUser);
  }

  async add(user: User): Promise<void> {
    const index = this.users.findIndex((u) => u.key === user.key);
    if (index === -1) this.users.push(copyUser(user));
    else this.users[index] = copyUser(user);
  }

  async get(key: string): Promise<User> {
    const user = this.users.find((u) => u.key === key);
    if (!user) throw new UserNotFoundError();
    return copyUser(user);
  }

  async getByIdentifier(id: Identifier): Promise<User> {
    const exact = this.users.filter((u) => u.identifiers.get(id.namespaceAndKind) === id.value);
    if (exact.length > 1) throw ambiguousUserError(id, exact.length);
    if (exact.length === 1) return copyUser(exact[0]);

    if (kindOf(id.namespaceAndKind) !== KIND_EMAIL) throw new UserNotFoundError();
    const byEmail = this.users.filter((u) =>
      u.identifiers
        .toList()
        .some((own) => kindOf(own.namespaceAndKind) === KIND_EMAIL && own.value === id.value)
    );
    if (byEmail.length > 1) throw ambiguousUserError(id, byEmail.length);
    if (byEmail.length === 1) return copyUser(byEmail[0]);
    throw new UserNotFoundError();
  }

  async find(candidates: IdentifierSet, signal: AbortSignal): Promise<User> {
    for (const id of candidates.toList()) {
      try {
        return await this.getByIdentifier(id);
      } catch (err) {
        if (!isUserNotFound(err)) throw err;
      }
      signal.throwIfAborted();
    }
    throw new UserNotFoundError();
  }

  async setPreferences(key: string, preferences: PreferenceMap): Promise<void> {
    const user = this.users.find((u) => u.key === key);
    if (!user) throw new UserNotFoundError();
    user.preferences = copyPreferences(preferences);
  }
}
