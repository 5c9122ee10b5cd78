import {
  BLACKHOLE_DISCARD,
  type Event,
  type Notification,
  type Processor
} from "@hookrelay/shared";
import { log } from "./logger.js";

export type ProcessFunc<TData> = (
  event: Event<TData>,
  notifications: Notification[],
  signal: AbortSignal
) => Promise<Notification[]> | Notification[];

export function processorFunc<TData = unknown>(
  name: string,
  fn: ProcessFunc<TData>
): Processor<TData> {
  return {
    name,
    process: async (event, notifications, signal) => fn(event, notifications, signal)
  };
}

/** Drops notifications nobody could receive. */
export function dropUnaddressed(): Processor {
  return processorFunc("drop-unaddressed", (event, notifications) => {
    const kept = notifications.filter((n) => n.recipient.size > 0);
    if (kept.length < notifications.length) {
      log({
        level: "debug",
        msg: "dropped notifications without recipients",
        event_id: event.context.id,
        dropped: notifications.length - kept.length
      });
    }
    return kept;
  });
}

/**
 * Addresses recipient-less notifications to the black hole, so the blackhole transport
 * accepts them instead of every transport failing.
 */
export function routeUnaddressedToBlackhole(): Processor {
  return processorFunc("route-unaddressed-to-blackhole", (_event, notifications) =>
    notifications.map((n) => {
      if (n.recipient.size > 0) return n;
      const recipient = n.recipient.copy();
      recipient.add(BLACKHOLE_DISCARD);
      return n.withRecipient(recipient);
    })
  );
}
