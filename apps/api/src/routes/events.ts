import express from "express";
import type { Request, RequestHandler, Response, Router } from "express";
import {
  processorName,
  type Event,
  type Notification,
  type Processor,
  type WebhookRequest
} from "@hookrelay/shared";
import { errorMessage, findHttpError } from "../errors.js";
import { errorFields, log } from "../logger.js";
import type { Notifier } from "../notifier/transport.js";
import type { Source } from "../source.js";
import { requestSignal } from "./requestSignal.js";

const maxBodyBytes = "5mb";

function sendText(res: Response, status: number, body: string) {
  res.status(status).type("text/plain").send(body);
}

function sendFailure(res: Response, source: string, prefix: string, err: unknown) {
  const httpErr = findHttpError(err);
  const status = httpErr?.code ?? 500;
  const reason = httpErr ? errorMessage(httpErr.reason ?? httpErr) : errorMessage(err);
  log({
    level: status < 500 ? "warn" : "error",
    msg: prefix,
    source,
    status,
    ...errorFields(httpErr?.reason ?? err)
  });
  sendText(res, status, `${prefix}: ${reason}\n`);
}

function toWebhookRequest(req: Request, signal: AbortSignal): WebhookRequest {
  return {
    method: req.method,
    path: req.originalUrl ?? req.url,
    headers: req.headers,
    body: Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0),
    signal
  };
}

/**
 * Handles one webhook inline: parse, run the source's processors and then the shared
 * ones, and push every resulting notification. Push failures are logged; the caller
 * still gets 202 once every push has been attempted.
 */
export function createEventHandler({
  source,
  processors,
  notifier
}: {
  source: Source;
  processors: readonly Processor[];
  notifier: Notifier;
}): RequestHandler {
  const chain = [...source.processors, ...processors];

  return async (req, res, next) => {
    try {
      const signal = requestSignal(req, res);
      log({ level: "debug", msg: "handling incoming webhook", source: source.key, path: req.path });

      let event: Event | null;
      try {
        event = await source.parser.parse(toWebhookRequest(req, signal));
      } catch (err) {
        sendFailure(res, source.key, "failed to parse event", err);
        return;
      }

      if (!event) {
        log({ level: "debug", msg: "ignoring uninteresting event", source: source.key });
        sendText(res, 200, "thanks but we're not interested in that event\n");
        return;
      }

      let notifications: Notification[] = [];
      for (const processor of chain) {
        try {
          notifications = await processor.process(event, notifications, signal);
        } catch (err) {
          sendFailure(
            res,
            source.key,
            `failed during processing (processor ${processorName(processor)})`,
            err
          );
          return;
        }
      }

      const eventId = event.context.id;
      if (notifications.length === 0) {
        log({
          level: "debug",
          msg: "no notifications to send after processing",
          source: source.key,
          event_id: eventId
        });
        sendText(res, 200, "no notifications to send\n");
        return;
      }

      log({
        level: "debug",
        msg: "dispatching notifications",
        source: source.key,
        event_id: eventId,
        notifications_count: notifications.length
      });

      let failed = 0;
      for (const notification of notifications) {
        try {
          await notifier.push(notification, signal);
        } catch (err) {
          failed++;
          log({
            level: "warn",
            msg: "failed to push notification",
            source: source.key,
            event_id: eventId,
            recipient: notification.recipient.toString(),
            ...errorFields(err)
          });
        }
      }

      if (failed > 0) {
        log({
          level: "warn",
          msg: "some notifications failed to send",
          source: source.key,
          event_id: eventId,
          total_notifications: notifications.length,
          failed_count: failed
        });
      }

      sendText(res, 202, "Notifications dispatched\n");
    } catch (err) {
      next(err);
    }
  };
}

export function registerEventRoutes({
  router,
  sources,
  processors,
  notifier
}: {
  router: Router;
  sources: readonly Source[];
  processors: readonly Processor[];
  notifier: Notifier;
}): void {
  for (const source of sources) {
    router.post(
      `/event/${source.key}`,
      express.raw({ type: () => true, limit: maxBodyBytes }),
      createEventHandler({ source, processors, notifier })
    );
  }
}
