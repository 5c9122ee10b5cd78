import {
  IdentifierSet,
  copyPreferences,
  setPreference,
  type EventType,
  type Identifier,
  type PreferenceMap,
  type TransportKey
} from "@hookrelay/shared";

/** Somebody who may receive notifications, and how they want them. */
export type User = {
  /** Indexes the user in the store, e.g. for the preferences routes. */
  key: string;
  identifiers: IdentifierSet;
  preferences: PreferenceMap;
};

export type UserOption = (user: User) => void;

export function createUser(key: string, ...options: UserOption[]): User {
  const user: User = { key, identifiers: new IdentifierSet(), preferences: {} };
  for (const option of options) option(user);
  return user;
}

export function withIdentifier(id: Identifier): UserOption {
  return (user) => user.identifiers.add(id);
}

export function withIdentifiers(ids: IdentifierSet): UserOption {
  return (user) => user.identifiers.merge(ids);
}

export function withPreference(
  eventType: EventType,
  transport: TransportKey,
  wants: boolean
): UserOption {
  return (user) => setPreference(user.preferences, eventType, transport, wants);
}

export function withPreferences(preferences: PreferenceMap): UserOption {
  return (user) => {
    user.preferences = copyPreferences(preferences);
  };
}

export function copyUser(user: User): User {
  return {
    key: user.key,
    identifiers: user.identifiers.copy(),
    preferences: copyPreferences(user.preferences)
  };
}
