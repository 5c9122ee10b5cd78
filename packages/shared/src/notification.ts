import type { EventContext, TransportKey } from "./event.js";
import type { IdentifierSet } from "./identifierSet.js";

/**
 * A message for one recipient, rendered per transport. Implementations behave as
 * values: withRecipient and clone return new notifications, leaving the receiver as
 * it was.
 */
export interface Notification {
  /** Identifies the event this notification originates from. */
  readonly context: EventContext;
  readonly recipient: IdentifierSet;
  render(transport: TransportKey): string;
  withRecipient(recipient: IdentifierSet): Notification;
  clone(): Notification;
}
