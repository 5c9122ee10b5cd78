import { describe, expect, it, vi } from "vitest";
import type { ChatPostMessageArguments } from "@slack/web-api";
import { identifier } from "@hookrelay/shared";
import { NotificationBuilder } from "../../src/notification/builder.js";
import { SLACK_ID, SlackTransport, type SlackApi } from "../../src/notifier/slack.js";
import { isPermanent } from "../../src/notifier/transport.js";
import {
  abortedSignal,
  liveSignal,
  rejectionOf,
  testContext,
  testNotification
} from "../support/notifications.js";

function fakeSlack() {
  const postMessage = vi
    .fn<(args: ChatPostMessageArguments) => Promise<unknown>>()
    .mockResolvedValue({ ok: true });
  const test = vi
    .fn<() => Promise<{ team?: string; user?: string }>>()
    .mockResolvedValue({ team: "relay", user: "relay-bot" });
  const client: SlackApi = { chat: { postMessage }, auth: { test } };
  return { client, postMessage, test };
}

describe("SlackTransport", () => {
  it("posts the rendered message to the recipient's Slack ID", async () => {
    const { client, postMessage } = fakeSlack();
    const transport = new SlackTransport("slack", client);
    const notification = new NotificationBuilder(testContext())
      .withRecipientIdentifiers(identifier(SLACK_ID, "U123"))
      .withDefaultMessage("plain")
      .withMessageForTransport("slack", "*formatted*")
      .withSlackOptions({ unfurl_links: false, icon_emoji: ":bell:" })
      .build();

    await transport.push(notification, liveSignal());

    expect(postMessage).toHaveBeenCalledWith({
      channel: "U123",
      unfurl_links: false,
      icon_emoji: ":bell:",
      text: "*formatted*"
    });
  });

  it("addresses the configured identifier", async () => {
    const { client, postMessage } = fakeSlack();
    const transport = new SlackTransport("slack", client, "chat.example.com/id");
    const notification = new NotificationBuilder(testContext())
      .withRecipientIdentifiers(
        identifier(SLACK_ID, "U123"),
        identifier("chat.example.com/id", "W42")
      )
      .withDefaultMessage("hello")
      .build();

    await transport.push(notification, liveSignal());

    expect(postMessage).toHaveBeenCalledWith({ channel: "W42", text: "hello" });
  });

  it("leaves text out when the message is empty", async () => {
    const { client, postMessage } = fakeSlack();
    const notification = new NotificationBuilder(testContext())
      .withRecipientIdentifiers(identifier(SLACK_ID, "U123"))
      .build();

    await new SlackTransport("slack", client).push(notification, liveSignal());

    expect(postMessage).toHaveBeenCalledWith({ channel: "U123" });
  });

  it("fails permanently without a Slack ID", async () => {
    const { client, postMessage } = fakeSlack();
    const err = await rejectionOf(
      new SlackTransport("slack", client).push(
        testNotification("com.example.test", identifier("email", "x@example.com")),
        liveSignal()
      )
    );
    expect(isPermanent(err)).toBe(true);
    expect(err instanceof Error ? err.message : "").toBe(
      "recipient does not have a slack.com/id identifier"
    );
    expect(postMessage).not.toHaveBeenCalled();
  });

  it("does not post once the signal is aborted", async () => {
    const { client, postMessage } = fakeSlack();
    const err = await rejectionOf(
      new SlackTransport("slack", client).push(
        testNotification("com.example.test", identifier(SLACK_ID, "U123")),
        abortedSignal()
      )
    );
    expect(err).toBeInstanceOf(DOMException);
    expect(postMessage).not.toHaveBeenCalled();
  });

  it("validates by testing authentication", async () => {
    const { client, test } = fakeSlack();
    const transport = new SlackTransport("slack", client);
    await transport.validate(liveSignal());
    expect(test).toHaveBeenCalledTimes(1);

    test.mockRejectedValueOnce(new Error("invalid_auth"));
    const err = await rejectionOf(transport.validate(liveSignal()));
    expect(isPermanent(err)).toBe(true);
    expect(err instanceof Error ? err.message : "").toBe("authentication failed");
  });
});
