import type { Notification } from "./notification.js";

/** Unique within its source. */
export type EventId = string;

/** Reverse-DNS name describing the occurrence, e.g. "com.gitlab.push". */
export type EventType = string;

/** Names a delivery channel, e.g. "slack" or "email". */
export type TransportKey = string;

export class EventContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventContextError";
  }
}

export type EventContextFields = {
  id: EventId;
  source: string;
  type: EventType;
  subject?: string;
  time?: Date;
  labels?: Readonly<Record<string, string>>;
};

/**
 * Validates a URI reference for use as an event source. Relative references such as
 * "/webhooks/github" are accepted.
 */
export function eventSource(uri: string): string {
  if (uri.trim() === "") {
    throw new EventContextError("event source must not be empty");
  }
  try {
    new URL(uri, "http://localhost");
  } catch {
    throw new EventContextError(`invalid event source URI: ${uri}`);
  }
  return uri;
}

/**
 * Metadata describing an event, modelled on the CloudEvents attributes. Instances are
 * values: the with* methods return modified copies and never touch the receiver.
 */
export class EventContext {
  readonly id: EventId;
  readonly source: string;
  readonly type: EventType;
  readonly subject?: string;
  private readonly timestamp?: Date;
  private readonly labelMap?: Readonly<Record<string, string>>;

  constructor(fields: EventContextFields) {
    this.id = fields.id;
    this.source = fields.source;
    this.type = fields.type;
    this.subject = fields.subject;
    this.timestamp = fields.time ? new Date(fields.time.getTime()) : undefined;
    this.labelMap = fields.labels ? { ...fields.labels } : undefined;
  }

  get time(): Date | undefined {
    return this.timestamp ? new Date(this.timestamp.getTime()) : undefined;
  }

  get labels(): Record<string, string> | undefined {
    return this.labelMap ? { ...this.labelMap } : undefined;
  }

  withId(id: EventId): EventContext {
    return new EventContext({ ...this.fields(), id });
  }

  withSource(source: string): EventContext {
    return new EventContext({ ...this.fields(), source });
  }

  withType(type: EventType): EventContext {
    return new EventContext({ ...this.fields(), type });
  }

  withSubject(subject: string): EventContext {
    return new EventContext({ ...this.fields(), subject });
  }

  withTime(time: Date): EventContext {
    return new EventContext({ ...this.fields(), time });
  }

  withLabels(labels: Readonly<Record<string, string>>): EventContext {
    return new EventContext({ ...this.fields(), labels });
  }

  copy(): EventContext {
    return new EventContext(this.fields());
  }

  fields(): EventContextFields {
    return {
      id: this.id,
      source: this.source,
      type: this.type,
      subject: this.subject,
      time: this.time,
      labels: this.labels
    };
  }
}

/** An occurrence in an external system, as produced by a Parser. Never mutated. */
export type Event<TData = unknown> = {
  readonly context: EventContext;
  readonly data: TData;
};

/** Describes an event type in user-friendly terms. */
export type TypeDescriptor = {
  key: EventType;
  title: string;
  description?: string;
};

export type WebhookHeaders = Readonly<Record<string, string | string[] | undefined>>;

/** The parts of an incoming HTTP request a parser may inspect. Header names are lowercase. */
export type WebhookRequest = {
  method: string;
  path: string;
  headers: WebhookHeaders;
  body: Buffer;
  signal: AbortSignal;
};

export function headerValue(request: { headers: WebhookHeaders }, name: string): string | undefined {
  const raw = request.headers[name.toLowerCase()];
  return Array.isArray(raw) ? raw[0] : raw;
}

/**
 * Turns an incoming webhook into a canonical Event. Resolves to null when the request
 * is well-formed but describes an event nobody asked for.
 */
export interface Parser<TData = unknown> {
  parse(request: WebhookRequest): Promise<Event<TData> | null>;
  /** Every event type this parser may produce. */
  eventTypes(): TypeDescriptor[];
}

/**
 * One stage of the event-to-notifications pipeline. Receives whatever the previous
 * stage returned and may return a new list or modify the given one.
 */
export interface Processor<TData = unknown> {
  readonly name?: string;
  process(
    event: Event<TData>,
    notifications: Notification[],
    signal: AbortSignal
  ): Promise<Notification[]>;
}

export function processorName(processor: { readonly name?: string }): string {
  return processor.name ?? processor.constructor.name;
}
