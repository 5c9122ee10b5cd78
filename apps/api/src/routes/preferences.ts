import express from "express";
import type { Router } from "express";
import {
  EventContext,
  setPreference,
  type PreferenceMap,
  type TransportKey
} from "@hookrelay/shared";
import { validationError } from "../errors.js";
import { NotificationBuilder } from "../notification/builder.js";
import {
  chainPreferences,
  mapPreferences,
  type PreferenceProvider
} from "../preference/preference.js";
import type { Source } from "../source.js";
import type { UserStore } from "../user/store.js";
import type { User } from "../user/user.js";
import { requestSignal } from "./requestSignal.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads `{"preferences": {<eventType>: {<transport>: boolean}}}`. */
export function parsePreferencesBody(body: unknown): PreferenceMap {
  if (!isRecord(body) || !isRecord(body.preferences)) {
    throw validationError("Body must be an object with a preferences object", [
      "preferences"
    ]);
  }
  const preferences: PreferenceMap = {};
  const invalid: string[] = [];
  for (const [eventType, byTransport] of Object.entries(body.preferences)) {
    if (eventType === "__proto__" || !isRecord(byTransport)) {
      invalid.push(`preferences.${eventType}`);
      continue;
    }
    preferences[eventType] = {};
    for (const [transport, wants] of Object.entries(byTransport)) {
      if (transport === "__proto__" || typeof wants !== "boolean") {
        invalid.push(`preferences.${eventType}.${transport}`);
        continue;
      }
      setPreference(preferences, eventType, transport, wants);
    }
  }
  if (invalid.length > 0) {
    throw validationError("Preferences must map event types to transport booleans", invalid);
  }
  return preferences;
}

/**
 * The preferences as the server currently sees them: every registered event type and
 * transport. Routing rules come first, then the stored map, then the default provider
 * (true when nothing has an opinion). Stale event types and transports are left out.
 */
export async function hydratePreferences({
  user,
  stored,
  sources,
  transports,
  routingPreferences,
  defaultPreferences,
  signal
}: {
  user: User;
  stored: PreferenceMap;
  sources: readonly Source[];
  transports: readonly TransportKey[];
  routingPreferences: PreferenceProvider;
  defaultPreferences: PreferenceProvider;
  signal: AbortSignal;
}): Promise<PreferenceMap> {
  const provider = chainPreferences(
    routingPreferences,
    mapPreferences(stored),
    defaultPreferences
  );
  const hydrated: PreferenceMap = {};
  for (const source of sources) {
    for (const { key: eventType } of source.parser.eventTypes()) {
      const probe = new NotificationBuilder(
        new EventContext({ id: "preferences", source: `/users/${user.key}`, type: eventType })
      )
        .withRecipient(user.identifiers)
        .build();
      for (const transport of transports) {
        const wants = (await provider.wants(probe, transport, signal)) ?? true;
        setPreference(hydrated, eventType, transport, wants);
      }
    }
  }
  return hydrated;
}

export function registerPreferenceRoutes({
  router,
  store,
  sources,
  transports,
  routingPreferences,
  defaultPreferences
}: {
  router: Router;
  store: UserStore;
  sources: readonly Source[];
  transports: readonly TransportKey[];
  routingPreferences: PreferenceProvider;
  defaultPreferences: PreferenceProvider;
}): void {
  router.get("/users/:key/preferences", async (req, res, next) => {
    try {
      const signal = requestSignal(req, res);
      const user = await store.get(req.params.key, signal);
      const preferences = await hydratePreferences({
        user,
        stored: user.preferences,
        sources,
        transports,
        routingPreferences,
        defaultPreferences,
        signal
      });
      return res.json({ preferences });
    } catch (err) {
      next(err);
    }
  });

  // Any content type: the body is JSON whatever the client labels it.
  const jsonBody = express.json({ type: () => true });
  router.put("/users/:key/preferences", jsonBody, async (req, res, next) => {
    try {
      const signal = requestSignal(req, res);
      const stored = parsePreferencesBody(req.body);
      await store.setPreferences(req.params.key, stored, signal);
      const user = await store.get(req.params.key, signal);
      const preferences = await hydratePreferences({
        user,
        stored,
        sources,
        transports,
        routingPreferences,
        defaultPreferences,
        signal
      });
      return res.json({ preferences });
    } catch (err) {
      next(err);
    }
  });
}
