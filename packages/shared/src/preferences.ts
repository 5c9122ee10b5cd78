import type { EventType, TransportKey } from "./event.js";

/**
 * Explicit delivery decisions by event type, then transport. Sparse: a missing entry
 * means "no opinion".
 */
export type PreferenceMap = Record<EventType, Record<TransportKey, boolean>>;

export function lookupPreference(
  map: PreferenceMap,
  eventType: EventType,
  transport: TransportKey
): boolean | undefined {
  if (!Object.hasOwn(map, eventType)) return undefined;
  const byTransport = map[eventType];
  if (!Object.hasOwn(byTransport, transport)) return undefined;
  return byTransport[transport];
}

export function setPreference(
  map: PreferenceMap,
  eventType: EventType,
  transport: TransportKey,
  wants: boolean
): void {
  if (!Object.hasOwn(map, eventType)) map[eventType] = {};
  map[eventType][transport] = wants;
}

export function copyPreferences(map: PreferenceMap): PreferenceMap {
  const res: PreferenceMap = {};
  for (const [eventType, byTransport] of Object.entries(map)) {
    res[eventType] = { ...byTransport };
  }
  return res;
}
