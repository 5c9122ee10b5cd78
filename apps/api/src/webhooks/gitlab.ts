import crypto from "crypto";
import { headerValue, type WebhookRequest } from "@hookrelay/shared";
import { httpError } from "../errors.js";
import {
  checkAllowed,
  decodeJsonObject,
  type JsonObject,
  type WebhookDelivery,
  type WebhookHook
} from "./hook.js";

export const gitlabEventTitles: Readonly<Record<string, string>> = {
  push: "Push",
  tag_push: "Tag push",
  merge_request: "Merge request",
  note: "Comment",
  issue: "Issue",
  pipeline: "Pipeline",
  job: "Job",
  deployment: "Deployment",
  release: "Release"
};

/** "Merge Request Hook" becomes "merge_request". */
export function gitlabEventName(header: string): string {
  return header
    .trim()
    .replace(/\s+hook$/i, "")
    .toLowerCase()
    .replace(/\s+/g, "_");
}

function sameToken(expected: string, actual: string): boolean {
  // digests have equal length, which timingSafeEqual needs
  const a = crypto.createHash("sha256").update(expected).digest();
  const b = crypto.createHash("sha256").update(actual).digest();
  return crypto.timingSafeEqual(a, b);
}

/** Checks x-gitlab-token against the configured secret token. */
export class GitLabHook implements WebhookHook<JsonObject> {
  readonly name = "gitlab";
  readonly typePrefix = "com.gitlab";
  readonly eventTitles = gitlabEventTitles;

  constructor(private readonly token: string) {
    if (token === "") throw new Error("GitLab webhook token must not be empty");
  }

  async parse(
    request: WebhookRequest,
    allowlist: readonly string[]
  ): Promise<WebhookDelivery<JsonObject>> {
    const header = headerValue(request, "x-gitlab-event");
    if (!header) throw httpError(400, "missing x-gitlab-event header");

    const token = headerValue(request, "x-gitlab-token");
    if (token === undefined || !sameToken(this.token, token)) {
      throw httpError(401, "token mismatch");
    }

    const event = gitlabEventName(header);
    checkAllowed(event, allowlist);
    return { event, payload: decodeJsonObject(request.body) };
  }
}
