import crypto from "crypto";
import {
  EventContext,
  eventSource,
  type Event,
  type Parser,
  type TypeDescriptor,
  type WebhookRequest
} from "@hookrelay/shared";
import { EventNotAllowedError, type WebhookDelivery, type WebhookHook } from "./hook.js";

/**
 * Exposes a webhook hook as a Parser. Deliveries for events off the allowlist are
 * ignorable and resolve to null; every accepted delivery gets a fresh random id.
 */
export class WebhookParser<TPayload> implements Parser<WebhookDelivery<TPayload>> {
  private readonly source: string;

  constructor(
    private readonly hook: WebhookHook<TPayload>,
    private readonly events: readonly string[]
  ) {
    this.source = eventSource(`/webhooks/${hook.name}`);
  }

  async parse(request: WebhookRequest): Promise<Event<WebhookDelivery<TPayload>> | null> {
    let delivery: WebhookDelivery<TPayload>;
    try {
      delivery = await this.hook.parse(request, this.events);
    } catch (err) {
      if (err instanceof EventNotAllowedError) return null;
      throw err;
    }

    return {
      context: new EventContext({
        id: crypto.randomUUID(),
        source: this.source,
        type: this.eventType(delivery.event),
        time: new Date()
      }),
      data: delivery
    };
  }

  eventTypes(): TypeDescriptor[] {
    return this.events.map((event) => ({
      key: this.eventType(event),
      title: this.hook.eventTitles[event] ?? event
    }));
  }

  private eventType(event: string): string {
    return `${this.hook.typePrefix}.${event}`;
  }
}

export function webhookParser<TPayload>(
  hook: WebhookHook<TPayload>,
  ...events: string[]
): WebhookParser<TPayload> {
  return new WebhookParser(hook, events);
}
