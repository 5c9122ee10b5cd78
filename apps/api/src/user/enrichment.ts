import type { Event, Notification, Processor } from "@hookrelay/shared";
import { errorFields, log } from "../logger.js";
import { isUserNotFound, type UserStore } from "./store.js";

/**
 * Adds every identifier the store knows for each recipient, so transports keyed on
 * other systems (a Slack ID, say) can reach them. Lookup failures leave the
 * notification as it was.
 */
export class IdentifierEnrichmentProcessor implements Processor {
  readonly name = "identifier-enrichment";

  constructor(private readonly store: UserStore) {}

  async process(
    event: Event,
    notifications: Notification[],
    signal: AbortSignal
  ): Promise<Notification[]> {
    const enriched: Notification[] = [];
    for (const notification of notifications) {
      const recipient = notification.recipient;
      try {
        const user = await this.store.find(recipient, signal);
        const merged = recipient.copy();
        merged.merge(user.identifiers);
        enriched.push(notification.withRecipient(merged));
      } catch (err) {
        log({
          level: isUserNotFound(err) ? "debug" : "warn",
          msg: isUserNotFound(err)
            ? "user not found for identifier enrichment"
            : "error finding user for identifier enrichment",
          event_id: event.context.id,
          recipient: recipient.toString(),
          ...errorFields(err)
        });
        enriched.push(notification);
      }
    }
    return enriched;
  }
}
