import { verify } from "@octokit/webhooks-methods";
import { headerValue, type WebhookRequest } from "@hookrelay/shared";
import { httpError } from "../errors.js";
import {
  checkAllowed,
  decodeJsonObject,
  type JsonObject,
  type WebhookDelivery,
  type WebhookHook
} from "./hook.js";

export const githubEventTitles: Readonly<Record<string, string>> = {
  push: "Push",
  pull_request: "Pull request",
  pull_request_review: "Pull request review",
  pull_request_review_comment: "Pull request review comment",
  issues: "Issue",
  issue_comment: "Issue comment",
  release: "Release",
  workflow_run: "Workflow run",
  check_suite: "Check suite",
  deployment_status: "Deployment status"
};

/** Verifies x-hub-signature-256 against the shared secret. */
export class GitHubHook implements WebhookHook<JsonObject> {
  readonly name = "github";
  readonly typePrefix = "com.github";
  readonly eventTitles = githubEventTitles;

  constructor(private readonly secret: string) {
    if (secret === "") throw new Error("GitHub webhook secret must not be empty");
  }

  async parse(
    request: WebhookRequest,
    allowlist: readonly string[]
  ): Promise<WebhookDelivery<JsonObject>> {
    const event = headerValue(request, "x-github-event");
    if (!event) throw httpError(400, "missing x-github-event header");

    const signature = headerValue(request, "x-hub-signature-256");
    if (!signature) throw httpError(401, "missing x-hub-signature-256 header");
    if (request.body.length === 0) throw httpError(400, "empty payload");

    const verified = await verify(this.secret, request.body.toString("utf8"), signature);
    if (!verified) throw httpError(401, "signature mismatch");

    checkAllowed(event, allowlist);
    return { event, payload: decodeJsonObject(request.body) };
  }
}
