import type { Notification } from "@hookrelay/shared";
import { isValidator } from "@hookrelay/shared";
import { errorFields, log, type Logger, type LogLevel } from "../logger.js";
import { sleep, type BackOffFactory } from "./backoff.js";
import { isPermanent, type Transport } from "./transport.js";

/** Shared by every decorator: keeps the inner key and forwards validate. */
abstract class TransportDecorator implements Transport {
  constructor(protected readonly inner: Transport) {}

  get key() {
    return this.inner.key;
  }

  abstract push(notification: Notification, signal: AbortSignal): Promise<void>;

  async validate(signal: AbortSignal): Promise<void> {
    if (isValidator(this.inner)) await this.inner.validate(signal);
  }
}

class TimeoutTransport extends TransportDecorator {
  constructor(
    inner: Transport,
    private readonly timeoutMs: number
  ) {
    super(inner);
  }

  async push(notification: Notification, signal: AbortSignal): Promise<void> {
    const deadline = AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)]);
    await this.inner.push(notification, deadline);
  }
}

class RetryTransport extends TransportDecorator {
  constructor(
    inner: Transport,
    private readonly maxTries: number,
    private readonly backOff: BackOffFactory
  ) {
    super(inner);
  }

  async push(notification: Notification, signal: AbortSignal): Promise<void> {
    const backOff = this.backOff();
    for (let attempt = 1; ; attempt++) {
      signal.throwIfAborted();
      try {
        await this.inner.push(notification, signal);
        return;
      } catch (err) {
        if (isPermanent(err) || attempt >= this.maxTries || signal.aborted) throw err;

        const delayMs = backOff.nextDelayMs();
        log({
          level: "warn",
          msg: "retrying push",
          id: notification.context.id,
          transport: this.key,
          attempt,
          next_retry_ms: delayMs,
          ...errorFields(err)
        });
        if (!(await sleep(delayMs, signal))) throw err;
      }
    }
  }
}

class LoggingTransport extends TransportDecorator {
  constructor(
    inner: Transport,
    private readonly logger: Logger,
    private readonly level: LogLevel
  ) {
    super(inner);
  }

  async push(notification: Notification, signal: AbortSignal): Promise<void> {
    await this.inner.push(notification, signal);
    this.logger({
      level: this.level,
      msg: "sent notification",
      id: notification.context.id,
      type: notification.context.type,
      to: notification.recipient.toString(),
      transport: this.key,
      message: notification.render("logger")
    });
  }
}

/** Gives every push its own deadline, still bounded by the caller's signal. */
export function withTimeout(transport: Transport, timeoutMs: number): Transport {
  return new TimeoutTransport(transport, timeoutMs);
}

/**
 * Retries failed pushes up to maxTries attempts in total. Permanent errors and an
 * aborted signal end the loop early; the last error is rethrown.
 */
export function withRetry(
  transport: Transport,
  maxTries: number,
  backOff: BackOffFactory
): Transport {
  if (!Number.isInteger(maxTries) || maxTries < 1) {
    throw new RangeError(`maxTries must be a positive integer, received: ${maxTries}`);
  }
  return new RetryTransport(transport, maxTries, backOff);
}

/** Logs each successful push. Failures are left to the dispatcher. */
export function withLogging(
  transport: Transport,
  logger: Logger = log,
  level: LogLevel = "info"
): Transport {
  return new LoggingTransport(transport, logger, level);
}
