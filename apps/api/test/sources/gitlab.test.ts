import { describe, expect, it } from "vitest";
import { EventContext, type Event } from "@hookrelay/shared";
import {
  gitlabSource,
  mergeRequestNotifications,
  mergeRequestRecipients
} from "../../src/sources/gitlab.js";
import type { JsonObject, WebhookDelivery } from "../../src/webhooks/hook.js";
import { liveSignal } from "../support/notifications.js";

function mergeRequest(action: string): JsonObject {
  return {
    object_kind: "merge_request",
    user: { username: "author" },
    project: { path_with_namespace: "acme/widgets" },
    object_attributes: { action, iid: 5, title: "Refactor" },
    reviewers: [{ username: "rev", id: 10 }, { username: "author", id: 11 }],
    assignees: [{ username: "rev", id: 10 }]
  };
}

function event(payload: JsonObject, name = "merge_request"): Event<WebhookDelivery<JsonObject>> {
  return {
    context: new EventContext({ id: "g-1", source: "/webhooks/gitlab", type: `com.gitlab.${name}` }),
    data: { event: name, payload }
  };
}

describe("mergeRequestRecipients", () => {
  it("notifies reviewers and assignees except the author", () => {
    expect(mergeRequestRecipients(mergeRequest("open")).map(String)).toEqual([
      "[gitlab.com/id:10 gitlab.com/username:rev]"
    ]);
  });

  it("only reacts to newly opened merge requests", () => {
    expect(mergeRequestRecipients(mergeRequest("merge"))).toEqual([]);
  });
});

describe("mergeRequestNotifications", () => {
  it("describes the merge request", async () => {
    const [n] = await mergeRequestNotifications.process(
      event(mergeRequest("open")),
      [],
      liveSignal()
    );
    expect(n?.context.subject).toBe("acme/widgets!5");
    expect(n?.render("writer")).toBe("author opened acme/widgets!5 for you: Refactor");
  });

  it("ignores pushes", async () => {
    await expect(
      mergeRequestNotifications.process(event({}, "push"), [], liveSignal())
    ).resolves.toEqual([]);
  });
});

describe("gitlabSource", () => {
  it("asks for merge request and push events", () => {
    expect(gitlabSource("test-token").parser.eventTypes().map((t) => t.key)).toEqual([
      "com.gitlab.merge_request",
      "com.gitlab.push"
    ]);
  });
});
