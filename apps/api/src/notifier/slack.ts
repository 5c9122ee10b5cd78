import { WebClient, type ChatPostMessageArguments } from "@slack/web-api";
import {
  KIND_ID,
  namespaceAndKind,
  type NamespaceAndKind,
  type Notification,
  type TransportKey
} from "@hookrelay/shared";
import { log } from "../logger.js";
import { permanent, type Transport } from "./transport.js";

/** The recipient identifier Slack messages are addressed to unless configured otherwise. */
export const SLACK_ID = namespaceAndKind("slack.com", KIND_ID);

/** Rich message features beyond the rendered text. */
export type SlackOptions = Pick<
  ChatPostMessageArguments,
  "attachments" | "blocks" | "thread_ts" | "icon_emoji" | "username" | "unfurl_links"
>;

export interface SlackNotification extends Notification {
  slackOptions(): SlackOptions;
}

export function isSlackNotification(
  notification: Notification
): notification is SlackNotification {
  return "slackOptions" in notification && typeof notification.slackOptions === "function";
}

/** The parts of the Slack Web API the transport calls. */
export type SlackApi = {
  chat: { postMessage(args: ChatPostMessageArguments): Promise<unknown> };
  auth: { test(): Promise<{ team?: string; user?: string }> };
};

export function createSlackClient(token: string): SlackApi {
  return new WebClient(token);
}

export class SlackTransport implements Transport {
  constructor(
    readonly key: TransportKey,
    private readonly client: SlackApi,
    private readonly identifier: NamespaceAndKind = SLACK_ID
  ) {}

  async push(notification: Notification, signal: AbortSignal): Promise<void> {
    const channel = notification.recipient.get(this.identifier);
    if (channel === undefined) {
      throw permanent(new Error(`recipient does not have a ${this.identifier} identifier`));
    }
    signal.throwIfAborted();

    const args: ChatPostMessageArguments = {
      channel,
      ...(isSlackNotification(notification) ? notification.slackOptions() : {})
    };
    const text = notification.render(this.key);
    if (text !== "") args.text = text;

    await abortable(this.client.chat.postMessage(args), signal);
  }

  async validate(signal: AbortSignal): Promise<void> {
    let identity: { team?: string; user?: string };
    try {
      identity = await abortable(this.client.auth.test(), signal);
    } catch (err) {
      throw permanent(new Error("authentication failed", { cause: err }));
    }
    log({
      level: "info",
      msg: "Slack transport connected",
      transport: this.key,
      slack_team: identity.team,
      slack_user: identity.user
    });
  }
}

/** The Slack client takes no signal, so stop waiting on it once the signal aborts. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
