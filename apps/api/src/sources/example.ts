import crypto from "crypto";
import {
  EventContext,
  GENERIC_EMAIL,
  identifier,
  type Event,
  type Parser,
  type TypeDescriptor,
  type WebhookRequest
} from "@hookrelay/shared";
import { httpError } from "../errors.js";
import { NotificationBuilder } from "../notification/builder.js";
import { processorFunc } from "../processors.js";
import { defineSource, type Source } from "../source.js";
import { decodeJsonObject } from "../webhooks/hook.js";

export const MESSAGE_SENT = "com.example.message_sent";

/** Somebody sent `to` (an email address) a comment. */
export type MessageSent = {
  from: string;
  to: string;
  comment: string;
};

export class MessageParser implements Parser<MessageSent> {
  constructor(private readonly sourceUri = "/sources/example") {}

  async parse(request: WebhookRequest): Promise<Event<MessageSent>> {
    const body = decodeJsonObject(request.body);
    const { from, to, comment } = body;
    if (typeof from !== "string" || typeof to !== "string" || typeof comment !== "string") {
      throw httpError(400, "from, to and comment must be strings");
    }
    if (to === "") throw httpError(400, "to must not be empty");

    return {
      context: new EventContext({
        id: crypto.randomUUID(),
        source: this.sourceUri,
        type: MESSAGE_SENT,
        subject: from
      }),
      data: { from, to, comment }
    };
  }

  eventTypes(): TypeDescriptor[] {
    return [
      { key: MESSAGE_SENT, title: "Message", description: "Somebody sent you a message" }
    ];
  }
}

export const messageNotifications = processorFunc<MessageSent>(
  "message-notifications",
  (event, notifications) => [
    ...notifications,
    new NotificationBuilder(event.context)
      .withRecipientIdentifiers(identifier(GENERIC_EMAIL, event.data.to))
      .withDefaultMessage(`${event.data.from} sent you a message: '${event.data.comment}'`)
      .withEmailSubject(`New message from ${event.data.from}`)
      .build()
  ]
);

export function exampleSource(): Source<MessageSent> {
  return defineSource("example", new MessageParser(), messageNotifications);
}
