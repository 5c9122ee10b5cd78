import type { Notification } from "@hookrelay/shared";
import { errorFields, log } from "../logger.js";
import type { PreferenceProvider } from "../preference/preference.js";
import type { Notifier, Transport } from "./transport.js";

/**
 * Pushes each notification over every transport, in declaration order, unless the
 * preferences explicitly opt out. Transport failures are collected, not short-circuited.
 */
export class DefaultNotifier implements Notifier {
  constructor(
    private readonly preferences: PreferenceProvider,
    private readonly transports: readonly Transport[]
  ) {}

  async push(notification: Notification, signal: AbortSignal): Promise<void> {
    const { id, type } = notification.context;
    const to = notification.recipient.toString();
    const errors: unknown[] = [];
    let attempted = 0;

    for (const transport of this.transports) {
      const wants = await this.preferences.wants(notification, transport.key, signal);
      if (wants === false) {
        log({
          level: "debug",
          msg: "skipping transport by preference",
          id,
          type,
          to,
          transport: transport.key
        });
        continue;
      }

      attempted++;
      try {
        await transport.push(notification, signal);
      } catch (err) {
        log({
          level: "warn",
          msg: "failed to push notification",
          id,
          type,
          to,
          transport: transport.key,
          ...errorFields(err)
        });
        errors.push(err);
      }
    }

    if (attempted === 0) {
      log({ level: "warn", msg: "no transports attempted for notification", id, type, to });
    }
    if (errors.length > 0) {
      throw new AggregateError(
        errors,
        `failed to push notification ${id} over ${errors.length} transport(s)`
      );
    }
  }
}
