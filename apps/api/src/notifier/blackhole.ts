import { KIND_BLACKHOLE, kindOf, type Notification, type TransportKey } from "@hookrelay/shared";
import { log } from "../logger.js";
import { permanent, type Transport } from "./transport.js";

export function isBlackholeAddressed(notification: Notification): boolean {
  return notification.recipient
    .toList()
    .some((id) => kindOf(id.namespaceAndKind) === KIND_BLACKHOLE);
}

/**
 * Accepts notifications addressed to a blackhole identifier and drops them, so routing
 * a recipient-less notification here counts as a delivery.
 */
export class BlackholeTransport implements Transport {
  constructor(readonly key: TransportKey = "blackhole") {}

  async push(notification: Notification, _signal: AbortSignal): Promise<void> {
    void _signal;
    if (!isBlackholeAddressed(notification)) {
      throw permanent(new Error("recipient does not have a blackhole identifier"));
    }
    log({
      level: "debug",
      msg: "notification discarded to black hole",
      id: notification.context.id,
      type: notification.context.type,
      to: notification.recipient.toString(),
      transport: this.key
    });
  }
}
