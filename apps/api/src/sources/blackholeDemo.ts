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
import { processorFunc, routeUnaddressedToBlackhole } from "../processors.js";
import { defineSource, type Source } from "../source.js";
import { decodeJsonObject } from "../webhooks/hook.js";

export const ANNOUNCEMENT = "com.example.announcement";

/** An announcement, optionally addressed to one email address. */
export type Announcement = {
  message: string;
  to?: string;
};

export class AnnouncementParser implements Parser<Announcement> {
  async parse(request: WebhookRequest): Promise<Event<Announcement>> {
    const { message, to } = decodeJsonObject(request.body);
    if (typeof message !== "string") throw httpError(400, "message must be a string");
    if (to !== undefined && typeof to !== "string") {
      throw httpError(400, "to must be a string when present");
    }

    return {
      context: new EventContext({
        id: crypto.randomUUID(),
        source: "/sources/blackhole-demo",
        type: ANNOUNCEMENT
      }),
      data: to ? { message, to } : { message }
    };
  }

  eventTypes(): TypeDescriptor[] {
    return [{ key: ANNOUNCEMENT, title: "Announcement" }];
  }
}

const announcementNotifications = processorFunc<Announcement>(
  "announcement-notifications",
  (event, notifications) => {
    const builder = new NotificationBuilder(event.context).withDefaultMessage(
      event.data.message
    );
    if (event.data.to) builder.withRecipientIdentifiers(identifier(GENERIC_EMAIL, event.data.to));
    return [...notifications, builder.build()];
  }
);

/** Announcements without a recipient go to the black hole instead of failing. */
export function blackholeDemoSource(): Source<Announcement> {
  return defineSource<Announcement>(
    "blackhole-demo",
    new AnnouncementParser(),
    announcementNotifications,
    routeUnaddressedToBlackhole()
  );
}
