import {
  IdentifierSet,
  KIND_ID,
  KIND_USERNAME,
  identifier,
  mergeAndDeduplicate,
  namespaceAndKind,
  type Identifier
} from "@hookrelay/shared";
import { NotificationBuilder } from "../notification/builder.js";
import { processorFunc } from "../processors.js";
import { defineSource, type Source } from "../source.js";
import { webhookParser } from "../webhooks/adapter.js";
import { GitHubHook } from "../webhooks/github.js";
import {
  numberField,
  objectField,
  objectsField,
  stringField,
  type JsonObject,
  type WebhookDelivery
} from "../webhooks/hook.js";

export const GITHUB_USERNAME = namespaceAndKind("github.com", KIND_USERNAME);
export const GITHUB_ID = namespaceAndKind("github.com", KIND_ID);

function githubUser(user: JsonObject): IdentifierSet {
  const ids: Identifier[] = [];
  const login = stringField(user, "login");
  const id = numberField(user, "id");
  if (login) ids.push(identifier(GITHUB_USERNAME, login));
  if (id !== undefined) ids.push(identifier(GITHUB_ID, id));
  return new IdentifierSet(ids);
}

/**
 * Who should look at the pull request: the newly requested reviewer, or on open every
 * requested reviewer and assignee. Drafts wait until they are ready for review. One
 * person listed twice is one recipient.
 */
export function reviewerCandidates(payload: JsonObject): IdentifierSet[] {
  const action = stringField(payload, "action");
  const pr = objectField(payload, "pull_request");
  let people: JsonObject[] = [];
  if (action === "review_requested") {
    const reviewer = objectField(payload, "requested_reviewer");
    if (reviewer) people = [reviewer];
  } else if (action === "opened" || action === "ready_for_review") {
    if (action === "opened" && pr?.draft === true) return [];
    people = [...objectsField(pr, "requested_reviewers"), ...objectsField(pr, "assignees")];
  }
  return mergeAndDeduplicate(people.map(githubUser).filter((set) => set.size > 0));
}

export const reviewRequestNotifications = processorFunc<WebhookDelivery<JsonObject>>(
  "github-review-requests",
  (event, notifications) => {
    if (event.data.event !== "pull_request") return notifications;
    const payload = event.data.payload;
    const pr = objectField(payload, "pull_request");
    const repo = stringField(objectField(payload, "repository"), "full_name") ?? "a repository";
    const sender = stringField(objectField(payload, "sender"), "login") ?? "somebody";
    const number = numberField(pr, "number");
    const title = stringField(pr, "title") ?? "";
    const url = stringField(pr, "html_url");
    const ref = number === undefined ? repo : `${repo}#${number}`;

    const context = event.context.withSubject(ref);
    const generated = reviewerCandidates(payload).map((recipient) =>
      new NotificationBuilder(context)
        .withRecipient(recipient)
        .withDefaultMessage(`${sender} requested your review on ${ref}: ${title}`)
        .withMessageForTransport(
          "slack",
          `${sender} requested your review on ${url ? `<${url}|${ref}>` : ref}: ${title}`
        )
        .withEmailSubject(`Review requested: ${ref}`)
        .build()
    );
    return [...notifications, ...generated];
  }
);

export function githubSource(secret: string): Source<WebhookDelivery<JsonObject>> {
  return defineSource(
    "github",
    webhookParser(new GitHubHook(secret), "pull_request"),
    reviewRequestNotifications
  );
}
