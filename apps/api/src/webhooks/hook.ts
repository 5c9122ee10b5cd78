import type { WebhookRequest } from "@hookrelay/shared";
import { httpError } from "../errors.js";

/** One verified webhook delivery: the upstream event name and its decoded body. */
export type WebhookDelivery<TPayload = unknown> = {
  event: string;
  payload: TPayload;
};

/** The delivered event is valid but was not asked for. */
export class EventNotAllowedError extends Error {
  constructor(readonly event: string) {
    super(`event "${event}" is not on the allowlist`);
    this.name = "EventNotAllowedError";
  }
}

/**
 * Verifies and decodes deliveries from one upstream system. Failures that should reach
 * the caller with a specific status are thrown as HttpError.
 */
export interface WebhookHook<TPayload = unknown> {
  /** Names the source URI: /webhooks/<name>. */
  readonly name: string;
  /** Event types are <typePrefix>.<event>, e.g. "com.github.pull_request". */
  readonly typePrefix: string;
  readonly eventTitles: Readonly<Record<string, string>>;
  parse(
    request: WebhookRequest,
    allowlist: readonly string[]
  ): Promise<WebhookDelivery<TPayload>>;
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeJsonObject(body: Buffer): JsonObject {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body.toString("utf8"));
  } catch (err) {
    throw httpError(400, new Error("malformed JSON payload", { cause: err }));
  }
  if (!isJsonObject(decoded)) throw httpError(400, "payload must be a JSON object");
  return decoded;
}

export function checkAllowed(event: string, allowlist: readonly string[]): void {
  if (!allowlist.includes(event)) throw new EventNotAllowedError(event);
}

export function objectField(obj: JsonObject, key: string): JsonObject | undefined {
  const value = obj[key];
  return isJsonObject(value) ? value : undefined;
}

export function stringField(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === "string" ? value : undefined;
}

export function numberField(obj: JsonObject | undefined, key: string): number | undefined {
  const value = obj?.[key];
  return typeof value === "number" ? value : undefined;
}

/** The object elements of an array field; anything else is skipped. */
export function objectsField(obj: JsonObject | undefined, key: string): JsonObject[] {
  const value = obj?.[key];
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}
