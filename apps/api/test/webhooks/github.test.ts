import { describe, expect, it } from "vitest";
import { sign } from "@octokit/webhooks-methods";
import { HttpError, httpError } from "../../src/errors.js";
import { GitHubHook } from "../../src/webhooks/github.js";
import { EventNotAllowedError } from "../../src/webhooks/hook.js";
import { rejectionOf, webhookRequest } from "../support/notifications.js";

const secret = "test-secret";
const body = JSON.stringify({ action: "opened", number: 7 });

async function signedRequest(event: string, payload = body) {
  return webhookRequest(
    { "x-github-event": event, "x-hub-signature-256": await sign(secret, payload) },
    payload
  );
}

describe("GitHubHook", () => {
  it("verifies and decodes a delivery", async () => {
    const delivery = await new GitHubHook(secret).parse(
      await signedRequest("pull_request"),
      ["pull_request"]
    );
    expect(delivery).toEqual({ event: "pull_request", payload: { action: "opened", number: 7 } });
  });

  it("rejects a bad signature", async () => {
    const request = webhookRequest(
      { "x-github-event": "pull_request", "x-hub-signature-256": await sign("other", body) },
      body
    );
    const err = await rejectionOf(new GitHubHook(secret).parse(request, ["pull_request"]));
    expect(httpError(401, "signature mismatch").matches(err)).toBe(true);
  });

  it("requires the event and signature headers", async () => {
    const hook = new GitHubHook(secret);
    const noEvent = await rejectionOf(hook.parse(webhookRequest({}, body), ["pull_request"]));
    expect(httpError(400, "missing x-github-event header").matches(noEvent)).toBe(true);

    const noSignature = await rejectionOf(
      hook.parse(webhookRequest({ "x-github-event": "push" }, body), ["push"])
    );
    expect(httpError(401, "missing x-hub-signature-256 header").matches(noSignature)).toBe(true);
  });

  it("rejects an empty payload", async () => {
    const request = webhookRequest(
      { "x-github-event": "push", "x-hub-signature-256": "sha256=00" },
      ""
    );
    const err = await rejectionOf(new GitHubHook(secret).parse(request, ["push"]));
    expect(httpError(400, "empty payload").matches(err)).toBe(true);
  });

  it("reports events off the allowlist only after verifying", async () => {
    const err = await rejectionOf(
      new GitHubHook(secret).parse(await signedRequest("issues"), ["pull_request"])
    );
    expect(err).toBeInstanceOf(EventNotAllowedError);
  });

  it("rejects a signed body that is not an object", async () => {
    const err = await rejectionOf(
      new GitHubHook(secret).parse(await signedRequest("push", "[1,2]"), ["push"])
    );
    expect(err).toBeInstanceOf(HttpError);
    expect(httpError(400, "payload must be a JSON object").matches(err)).toBe(true);
  });

  it("needs a secret", () => {
    expect(() => new GitHubHook("")).toThrow("GitHub webhook secret must not be empty");
  });
});
