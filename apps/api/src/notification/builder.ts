import {
  IdentifierSet,
  type EventContext,
  type Identifier,
  type TransportKey
} from "@hookrelay/shared";
import type { EmailNotification } from "../notifier/email.js";
import type { SlackNotification, SlackOptions } from "../notifier/slack.js";

type NotificationFields = {
  context: EventContext;
  recipient: IdentifierSet;
  fallbackMessage: string;
  messages: ReadonlyMap<TransportKey, string>;
  slackOptions?: SlackOptions;
  emailSubject?: string;
};

/** What NotificationBuilder produces: a value that also carries Slack and email extras. */
export class BuiltNotification implements SlackNotification, EmailNotification {
  readonly context: EventContext;
  readonly recipient: IdentifierSet;
  private readonly fields: NotificationFields;

  constructor(fields: NotificationFields) {
    this.fields = {
      ...fields,
      recipient: fields.recipient.copy(),
      messages: new Map(fields.messages),
      slackOptions: fields.slackOptions ? { ...fields.slackOptions } : undefined
    };
    this.context = this.fields.context;
    this.recipient = this.fields.recipient;
  }

  /** The message for the transport, or the default message when it has none. */
  render(transport: TransportKey): string {
    return this.fields.messages.get(transport) ?? this.fields.fallbackMessage;
  }

  withRecipient(recipient: IdentifierSet): BuiltNotification {
    return new BuiltNotification({ ...this.fields, recipient });
  }

  clone(): BuiltNotification {
    return new BuiltNotification({ ...this.fields, context: this.context.copy() });
  }

  slackOptions(): SlackOptions {
    return { ...this.fields.slackOptions };
  }

  emailSubject(): string | undefined {
    return this.fields.emailSubject;
  }
}

export class NotificationBuilder {
  private recipient = new IdentifierSet();
  private fallbackMessage = "";
  private readonly messages = new Map<TransportKey, string>();
  private slack?: SlackOptions;
  private subject?: string;

  constructor(private readonly context: EventContext) {}

  withRecipient(recipient: IdentifierSet): this {
    this.recipient = recipient.copy();
    return this;
  }

  /** Replaces the recipient with exactly these identifiers. */
  withRecipientIdentifiers(...ids: Identifier[]): this {
    this.recipient = new IdentifierSet(ids);
    return this;
  }

  addRecipientIdentifiers(...ids: Identifier[]): this {
    for (const id of ids) this.recipient.add(id);
    return this;
  }

  withDefaultMessage(message: string): this {
    this.fallbackMessage = message;
    return this;
  }

  withMessageForTransport(transport: TransportKey, message: string): this {
    this.messages.set(transport, message);
    return this;
  }

  withSlackOptions(options: SlackOptions): this {
    this.slack = options;
    return this;
  }

  withEmailSubject(subject: string): this {
    this.subject = subject;
    return this;
  }

  build(): BuiltNotification {
    return new BuiltNotification({
      context: this.context,
      recipient: this.recipient,
      fallbackMessage: this.fallbackMessage,
      messages: this.messages,
      slackOptions: this.slack,
      emailSubject: this.subject
    });
  }
}
