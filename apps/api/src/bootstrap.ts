import type { Pool } from "pg";
import type { Processor } from "@hookrelay/shared";
import type { RelayConfig } from "./config/env.js";
import { createPool } from "./data/db.js";
import { exponentialBackOff } from "./notifier/backoff.js";
import { BlackholeTransport, isBlackholeAddressed } from "./notifier/blackhole.js";
import { withLogging, withRetry, withTimeout } from "./notifier/decorators.js";
import { createMailer, EmailTransport, type Mailer } from "./notifier/email.js";
import { createSlackClient, SlackTransport, type SlackApi } from "./notifier/slack.js";
import type { Transport } from "./notifier/transport.js";
import { WriterTransport, type WriteTarget } from "./notifier/writer.js";
import {
  defaultPreference,
  preferenceFunc,
  type PreferenceProvider
} from "./preference/preference.js";
import { dropUnaddressed } from "./processors.js";
import { createServer, type RelayServer } from "./server.js";
import type { Source } from "./source.js";
import { blackholeDemoSource } from "./sources/blackholeDemo.js";
import { exampleSource } from "./sources/example.js";
import { githubSource } from "./sources/github.js";
import { gitlabSource } from "./sources/gitlab.js";
import { IdentifierEnrichmentProcessor } from "./user/enrichment.js";
import { PostgresUserStore } from "./user/postgresStore.js";
import { InMemoryUserStore, type UserStore } from "./user/store.js";

/** Clients the bootstrapper would otherwise create from the config. */
export type BootstrapDeps = {
  db?: Pool;
  slack?: SlackApi;
  mailer?: Mailer;
  out?: WriteTarget;
};

const BLACKHOLE_KEY = "blackhole";

function remote(transport: Transport, config: RelayConfig): Transport {
  return withLogging(
    withRetry(
      withTimeout(transport, config.transportTimeoutMs),
      config.transportMaxTries,
      exponentialBackOff()
    )
  );
}

export function buildTransports(config: RelayConfig, deps: BootstrapDeps = {}): Transport[] {
  const transports: Transport[] = [new WriterTransport(deps.out ?? process.stderr)];
  const slack =
    deps.slack ?? (config.slackToken ? createSlackClient(config.slackToken) : undefined);
  if (slack) {
    transports.push(remote(new SlackTransport("slack", slack, config.slackIdentifier), config));
  }
  if (config.smtp) {
    const mailer = deps.mailer ?? createMailer(config.smtp);
    transports.push(remote(new EmailTransport("email", mailer, config.smtp.from), config));
  }
  transports.push(new BlackholeTransport(BLACKHOLE_KEY));
  return transports;
}

/** The blackhole only takes notifications addressed to it, whatever the user stored. */
export function buildRoutingPreferences(): PreferenceProvider {
  return preferenceFunc((notification, transport) =>
    transport === BLACKHOLE_KEY && !isBlackholeAddressed(notification) ? false : undefined
  );
}

export function buildSources(config: RelayConfig): Source[] {
  const sources: Source[] = [exampleSource(), blackholeDemoSource()];
  if (config.githubWebhookSecret) sources.push(githubSource(config.githubWebhookSecret));
  if (config.gitlabWebhookToken) sources.push(gitlabSource(config.gitlabWebhookToken));
  return sources;
}

export function buildServer(
  config: RelayConfig,
  deps: BootstrapDeps = {}
): { server: RelayServer; userStore: UserStore; db?: Pool } {
  const db = deps.db ?? (config.databaseUrl ? createPool(config.databaseUrl) : undefined);
  const userStore: UserStore = db ? new PostgresUserStore(db) : new InMemoryUserStore();
  const processors: Processor[] = [
    new IdentifierEnrichmentProcessor(userStore),
    dropUnaddressed()
  ];
  const server = createServer({
    host: config.host,
    port: config.port,
    sources: buildSources(config),
    processors,
    transports: buildTransports(config, deps),
    userStore,
    routingPreferences: buildRoutingPreferences(),
    defaultPreferences: defaultPreference(config.defaultPreference)
  });
  return { server, userStore, db };
}
