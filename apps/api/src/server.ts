import express from "express";
import { createServer as createHttpServer, type Server } from "http";
import type { AddressInfo } from "net";
import { isValidator, type Processor, type TransportKey } from "@hookrelay/shared";
import { AppError, errorBody, validationError } from "./errors.js";
import { buildRequestLog, deriveRequestId, errorFields, log } from "./logger.js";
import { DefaultNotifier } from "./notifier/dispatcher.js";
import type { Transport } from "./notifier/transport.js";
import {
  chainPreferences,
  defaultPreference,
  type PreferenceProvider
} from "./preference/preference.js";
import { registerConfigurationRoute } from "./routes/configuration.js";
import { registerEventRoutes } from "./routes/events.js";
import { healthRouter } from "./routes/health.js";
import { registerPreferenceRoutes } from "./routes/preferences.js";
import type { Source } from "./source.js";
import { UserPreferenceProvider } from "./user/preferenceProvider.js";
import { InMemoryUserStore, type UserStore } from "./user/store.js";

const shutdownGraceMs = 5_000;

function isTestRuntime(): boolean {
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

export type ServerOptions = {
  host?: string;
  port?: number;
  sources?: Source[];
  /** Run after each source's own processors, e.g. enrichment and filters. */
  processors?: Processor[];
  /** Tried in this order for every notification. */
  transports?: Transport[];
  userStore?: UserStore;
  /** Consulted before the recipient's stored preferences, which cannot override them. */
  routingPreferences?: PreferenceProvider;
  /** Consulted when the recipient's stored preferences have no opinion. */
  defaultPreferences?: PreferenceProvider;
  /** Mount onto an existing application instead of a fresh one. */
  app?: express.Express;
  /** How long in-flight requests may run once shutdown starts. */
  shutdownGraceMs?: number;
};

export type RelayServer = {
  app: express.Express;
  /** Runs every component's own validation; the first failure rejects. */
  validate: (signal: AbortSignal) => Promise<void>;
  /** Validates, serves until signal aborts, then drains. */
  run: (signal: AbortSignal) => Promise<void>;
  address: () => AddressInfo | null;
};

/** Errors body-parser raises carry the status they should answer with. */
function bodyParserError(err: unknown): AppError | undefined {
  if (typeof err !== "object" || err === null || !("type" in err)) return undefined;
  if (err.type === "entity.parse.failed") return validationError("Malformed JSON body");
  if (err.type === "entity.too.large") {
    return new AppError("PAYLOAD_TOO_LARGE", 413, "Request body too large");
  }
  return undefined;
}

function uniqueKeys(sources: readonly Source[], transports: readonly Transport[]): void {
  const seenSources = new Set<string>();
  for (const source of sources) {
    if (seenSources.has(source.key)) throw new Error(`duplicate source key "${source.key}"`);
    seenSources.add(source.key);
  }
  const seenTransports = new Set<TransportKey>();
  for (const transport of transports) {
    if (seenTransports.has(transport.key)) {
      throw new Error(`duplicate transport key "${transport.key}"`);
    }
    seenTransports.add(transport.key);
  }
}

export function createServer(options: ServerOptions = {}): RelayServer {
  const app = options.app ?? express();
  const host = options.host ?? "0.0.0.0";
  const port = options.port ?? 8000;
  const sources = options.sources ?? [];
  const processors = options.processors ?? [];
  const transports = options.transports ?? [];
  const userStore = options.userStore ?? new InMemoryUserStore();
  const routingPreferences = options.routingPreferences ?? chainPreferences();
  const defaultPreferences = options.defaultPreferences ?? defaultPreference(true);
  const graceMs = options.shutdownGraceMs ?? shutdownGraceMs;
  uniqueKeys(sources, transports);

  const notifier = new DefaultNotifier(
    chainPreferences(
      routingPreferences,
      new UserPreferenceProvider(userStore),
      defaultPreferences
    ),
    transports
  );
  const transportKeys = transports.map((t) => t.key);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start,
          request_id: deriveRequestId(req.headers)
        })
      );
    });
    next();
  });

  const router = express.Router();
  router.use("/healthz", healthRouter);
  registerEventRoutes({ router, sources, processors, notifier });
  registerPreferenceRoutes({
    router,
    store: userStore,
    sources,
    transports: transportKeys,
    routingPreferences,
    defaultPreferences
  });
  registerConfigurationRoute({ router, sources, transports: transportKeys });
  app.use(router);

  app.use((_req, res) => {
    res.status(404).json(errorBody(new AppError("NOT_FOUND", 404, "Not found")));
  });

  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      void _next;
      const appErr = err instanceof AppError ? err : bodyParserError(err);
      const status = appErr?.status ?? 500;
      // 4xx are client errors (expected sometimes); 5xx are server errors.
      log({
        level: status >= 500 ? "error" : "info",
        msg: "request_error",
        method: req.method,
        path: req.originalUrl ?? req.url,
        status,
        code: appErr?.code ?? "INTERNAL_ERROR",
        ...errorFields(err),
        error_stack:
          (status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1"
            ? err instanceof Error
              ? err.stack
              : undefined
            : undefined
      });
      if (res.headersSent) return;
      res.status(status).json(errorBody(appErr ?? new Error("Unexpected error")));
    }
  );

  async function validate(signal: AbortSignal): Promise<void> {
    const checks: Array<{ what: string; target: unknown }> = [
      ...sources.flatMap((source) => [
        { what: `parser ${source.key}`, target: source.parser },
        ...source.processors.map((p, i) => ({
          what: `source ${source.key} processor ${p.name ?? i}`,
          target: p
        }))
      ]),
      ...processors.map((p, i) => ({ what: `processor ${p.name ?? i}`, target: p })),
      ...transports.map((t) => ({ what: `transport ${t.key}`, target: t })),
      { what: "user store", target: userStore },
      { what: "routing preferences", target: routingPreferences },
      { what: "default preferences", target: defaultPreferences }
    ];
    for (const { what, target } of checks) {
      if (!isValidator(target)) continue;
      try {
        await target.validate(signal);
      } catch (err) {
        throw new Error(`${what} failed to validate`, { cause: err });
      }
    }
  }

  let httpServer: Server | undefined;

  async function run(signal: AbortSignal): Promise<void> {
    await validate(signal);

    const server = createHttpServer(app);
    httpServer = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    log({ level: "info", msg: "listening", host, port: address()?.port ?? port });

    await new Promise<void>((resolve, reject) => {
      const shutdown = () => {
        log({ level: "info", msg: "shutting down", grace_ms: graceMs });
        const timer = setTimeout(() => server.closeAllConnections(), graceMs);
        timer.unref();
        server.close((err) => {
          clearTimeout(timer);
          if (err) reject(err);
          else resolve();
        });
      };
      if (signal.aborted) shutdown();
      else signal.addEventListener("abort", shutdown, { once: true });
    });
  }

  function address(): AddressInfo | null {
    const addr = httpServer?.address();
    return addr && typeof addr === "object" ? addr : null;
  }

  return { app, validate, run, address };
}
