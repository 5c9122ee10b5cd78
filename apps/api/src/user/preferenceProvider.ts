import { lookupPreference, type Notification, type TransportKey } from "@hookrelay/shared";
import { errorFields, log } from "../logger.js";
import type { PreferenceProvider } from "../preference/preference.js";
import { isUserNotFound, type UserStore } from "./store.js";

/** Answers from the stored preferences of the recipient, when the store knows them. */
export class UserPreferenceProvider implements PreferenceProvider {
  constructor(private readonly store: UserStore) {}

  async wants(
    notification: Notification,
    transport: TransportKey,
    signal: AbortSignal
  ): Promise<boolean | undefined> {
    if (notification.recipient.size === 0) return undefined;
    try {
      const user = await this.store.find(notification.recipient, signal);
      return lookupPreference(user.preferences, notification.context.type, transport);
    } catch (err) {
      if (!isUserNotFound(err)) {
        log({
          level: "warn",
          msg: "failed to find user for preference lookup",
          recipient: notification.recipient.toString(),
          ...errorFields(err)
        });
      }
      return undefined;
    }
  }
}
