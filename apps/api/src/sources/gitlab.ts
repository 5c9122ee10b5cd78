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
import { GitLabHook } from "../webhooks/gitlab.js";
import {
  numberField,
  objectField,
  objectsField,
  stringField,
  type JsonObject,
  type WebhookDelivery
} from "../webhooks/hook.js";

export const GITLAB_USERNAME = namespaceAndKind("gitlab.com", KIND_USERNAME);
export const GITLAB_ID = namespaceAndKind("gitlab.com", KIND_ID);

function gitlabUser(user: JsonObject): IdentifierSet {
  const ids: Identifier[] = [];
  const username = stringField(user, "username");
  const id = numberField(user, "id");
  if (username) ids.push(identifier(GITLAB_USERNAME, username));
  if (id !== undefined) ids.push(identifier(GITLAB_ID, id));
  return new IdentifierSet(ids);
}

/** Reviewers and assignees of a newly opened merge request, excluding its author. */
export function mergeRequestRecipients(payload: JsonObject): IdentifierSet[] {
  const attributes = objectField(payload, "object_attributes");
  if (stringField(attributes, "action") !== "open") return [];
  const author = stringField(objectField(payload, "user"), "username");
  const people = [...objectsField(payload, "reviewers"), ...objectsField(payload, "assignees")];
  return mergeAndDeduplicate(
    people
      .map(gitlabUser)
      .filter((set) => set.size > 0 && set.get(GITLAB_USERNAME) !== author)
  );
}

export const mergeRequestNotifications = processorFunc<WebhookDelivery<JsonObject>>(
  "gitlab-merge-requests",
  (event, notifications) => {
    if (event.data.event !== "merge_request") return notifications;
    const payload = event.data.payload;
    const attributes = objectField(payload, "object_attributes");
    const project =
      stringField(objectField(payload, "project"), "path_with_namespace") ?? "a project";
    const author = stringField(objectField(payload, "user"), "username") ?? "somebody";
    const iid = numberField(attributes, "iid");
    const title = stringField(attributes, "title") ?? "";
    const ref = iid === undefined ? project : `${project}!${iid}`;

    const context = event.context.withSubject(ref);
    const generated = mergeRequestRecipients(payload).map((recipient) =>
      new NotificationBuilder(context)
        .withRecipient(recipient)
        .withDefaultMessage(`${author} opened ${ref} for you: ${title}`)
        .withEmailSubject(`Merge request opened: ${ref}`)
        .build()
    );
    return [...notifications, ...generated];
  }
);

export function gitlabSource(token: string): Source<WebhookDelivery<JsonObject>> {
  return defineSource(
    "gitlab",
    webhookParser(new GitLabHook(token), "merge_request", "push"),
    mergeRequestNotifications
  );
}
