import {
  isValidator,
  lookupPreference,
  type Notification,
  type PreferenceMap,
  type TransportKey,
  type Validator
} from "@hookrelay/shared";

/**
 * Decides whether a notification should go out over a transport: true to opt in,
 * false to opt out, undefined for no opinion.
 */
export interface PreferenceProvider {
  wants(
    notification: Notification,
    transport: TransportKey,
    signal: AbortSignal
  ): Promise<boolean | undefined>;
}

export type PreferenceFunc = (
  notification: Notification,
  transport: TransportKey,
  signal: AbortSignal
) => Promise<boolean | undefined> | boolean | undefined;

export function preferenceFunc(fn: PreferenceFunc): PreferenceProvider {
  return {
    wants: async (notification, transport, signal) => fn(notification, transport, signal)
  };
}

/** Answers from a stored map; unknown event types or transports have no opinion. */
export function mapPreferences(map: PreferenceMap): PreferenceProvider {
  return preferenceFunc((notification, transport) =>
    lookupPreference(map, notification.context.type, transport)
  );
}

export function defaultPreference(wants: boolean): PreferenceProvider {
  return preferenceFunc(() => wants);
}

/** The first provider with an opinion wins. */
export class PreferenceChain implements PreferenceProvider, Validator {
  constructor(private readonly providers: readonly PreferenceProvider[]) {}

  async wants(
    notification: Notification,
    transport: TransportKey,
    signal: AbortSignal
  ): Promise<boolean | undefined> {
    for (const provider of this.providers) {
      const result = await provider.wants(notification, transport, signal);
      if (result !== undefined) return result;
    }
    return undefined;
  }

  async validate(signal: AbortSignal): Promise<void> {
    const errors: unknown[] = [];
    for (const provider of this.providers) {
      if (!isValidator(provider)) continue;
      try {
        await provider.validate(signal);
      } catch (err) {
        errors.push(err);
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, "preference provider validation failed");
    }
  }
}

export function chainPreferences(...providers: PreferenceProvider[]): PreferenceChain {
  return new PreferenceChain(providers);
}
