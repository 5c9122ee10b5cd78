import type { Notification, TransportKey } from "@hookrelay/shared";
import { someError } from "../errors.js";

/** A named delivery channel. */
export interface Transport {
  readonly key: TransportKey;
  push(notification: Notification, signal: AbortSignal): Promise<void>;
}

/** Delivers a notification over every transport the recipient wants. */
export interface Notifier {
  push(notification: Notification, signal: AbortSignal): Promise<void>;
}

export type PushFunc = (notification: Notification, signal: AbortSignal) => Promise<void>;

export function createTransport(key: TransportKey, push: PushFunc): Transport {
  return { key, push };
}

/** Marks a failure that retrying cannot fix. */
export class PermanentError extends Error {
  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "PermanentError";
  }
}

export function permanent(err: unknown): PermanentError {
  return err instanceof PermanentError ? err : new PermanentError(err);
}

export function isPermanent(err: unknown): boolean {
  return someError(err, (candidate) => candidate instanceof PermanentError);
}
