import { describe, expect, it, vi } from "vitest";
import { identifier } from "@hookrelay/shared";
import { constantBackOff } from "../../src/notifier/backoff.js";
import { withRetry } from "../../src/notifier/decorators.js";
import { DefaultNotifier } from "../../src/notifier/dispatcher.js";
import { SLACK_ID, SlackTransport, type SlackApi } from "../../src/notifier/slack.js";
import { createTransport, permanent, type PushFunc } from "../../src/notifier/transport.js";
import {
  chainPreferences,
  defaultPreference,
  mapPreferences,
  preferenceFunc
} from "../../src/preference/preference.js";
import { containsError } from "../../src/errors.js";
import { UserPreferenceProvider } from "../../src/user/preferenceProvider.js";
import { InMemoryUserStore } from "../../src/user/store.js";
import { createUser, withIdentifier, withPreferences } from "../../src/user/user.js";
import {
  abortedSignal,
  liveSignal,
  rejectionOf,
  testNotification
} from "../support/notifications.js";

const notification = testNotification("com.example.test", identifier("username", "codell"));

describe("DefaultNotifier", () => {
  it("pushes over every transport in order", async () => {
    const order: string[] = [];
    const record = (key: string) =>
      createTransport(key, async () => {
        order.push(key);
      });
    const notifier = new DefaultNotifier(defaultPreference(true), [
      record("writer"),
      record("slack"),
      record("email")
    ]);

    await notifier.push(notification, liveSignal());
    expect(order).toEqual(["writer", "slack", "email"]);
  });

  it("skips transports the recipient opted out of", async () => {
    const slack = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const email = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const notifier = new DefaultNotifier(
      mapPreferences({ "com.example.test": { slack: false } }),
      [createTransport("slack", slack), createTransport("email", email)]
    );

    await notifier.push(notification, liveSignal());
    expect(slack).not.toHaveBeenCalled();
    expect(email).toHaveBeenCalledTimes(1);
  });

  it("honours a stored opt-out", async () => {
    const store = new InMemoryUserStore([
      createUser(
        "codell",
        withIdentifier(identifier("username", "codell")),
        withPreferences({ "com.gitlab.push": { slack: false, email: true } })
      )
    ]);
    const slack = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const email = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const notifier = new DefaultNotifier(
      chainPreferences(new UserPreferenceProvider(store), defaultPreference(true)),
      [createTransport("slack", slack), createTransport("email", email)]
    );

    await notifier.push(
      testNotification("com.gitlab.push", identifier("username", "codell")),
      liveSignal()
    );
    expect(slack).not.toHaveBeenCalled();
    expect(email).toHaveBeenCalledTimes(1);
  });

  it("treats no opinion as a yes", async () => {
    const push = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const notifier = new DefaultNotifier(preferenceFunc(() => undefined), [
      createTransport("writer", push)
    ]);
    await notifier.push(notification, liveSignal());
    expect(push).toHaveBeenCalledTimes(1);
  });

  it("keeps going after a failure and reports every error", async () => {
    const first = new Error("slack down");
    const second = new Error("smtp down");
    const writer = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const notifier = new DefaultNotifier(defaultPreference(true), [
      createTransport("slack", vi.fn<PushFunc>().mockRejectedValue(first)),
      createTransport("email", vi.fn<PushFunc>().mockRejectedValue(second)),
      createTransport("writer", writer)
    ]);

    const err = await rejectionOf(notifier.push(notification, liveSignal()));

    expect(writer).toHaveBeenCalledTimes(1);
    expect(err).toBeInstanceOf(AggregateError);
    expect(err instanceof AggregateError ? err.errors : []).toEqual([first, second]);
    expect(err instanceof Error ? err.message : "").toBe(
      "failed to push notification a1c11a53-c4be-488f-89b6-f83bf2d48dab over 2 transport(s)"
    );
    expect(containsError(err, second)).toBe(true);
  });

  it("reports a permanent failure after one attempt", async () => {
    const cause = new Error("channel_not_found");
    const push = vi.fn<PushFunc>().mockRejectedValue(permanent(cause));
    const notifier = new DefaultNotifier(defaultPreference(true), [
      withRetry(createTransport("slack", push), 3, constantBackOff(1))
    ]);

    const err = await rejectionOf(notifier.push(notification, liveSignal()));
    expect(push).toHaveBeenCalledTimes(1);
    expect(containsError(err, cause)).toBe(true);
  });

  it("succeeds when every transport was skipped", async () => {
    const push = vi.fn<PushFunc>();
    const notifier = new DefaultNotifier(defaultPreference(false), [
      createTransport("slack", push)
    ]);
    await expect(notifier.push(notification, liveSignal())).resolves.toBeUndefined();
    expect(push).not.toHaveBeenCalled();
  });

  it("consults the chain in order", async () => {
    const push = vi.fn<PushFunc>().mockResolvedValue(undefined);
    const notifier = new DefaultNotifier(
      chainPreferences(
        mapPreferences({ "com.example.other": { writer: false } }),
        defaultPreference(false)
      ),
      [createTransport("writer", push)]
    );
    await notifier.push(notification, liveSignal());
    expect(push).not.toHaveBeenCalled();
  });

  it("surfaces cancellation from a transport", async () => {
    const postMessage = vi.fn(async () => ({ ok: true }));
    const client: SlackApi = {
      chat: { postMessage },
      auth: { test: async () => ({}) }
    };
    const notifier = new DefaultNotifier(defaultPreference(true), [
      new SlackTransport("slack", client)
    ]);

    const err = await rejectionOf(
      notifier.push(testNotification("com.example.test", identifier(SLACK_ID, "U1")), abortedSignal())
    );

    expect(err).toBeInstanceOf(AggregateError);
    const [inner] = err instanceof AggregateError ? err.errors : [];
    expect(inner).toBeInstanceOf(DOMException);
    expect(inner instanceof DOMException ? inner.name : "").toBe("AbortError");
    expect(postMessage).not.toHaveBeenCalled();
  });
});
