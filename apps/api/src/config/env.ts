export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim();
}

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = optionalEnv(env, key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parsePositiveInt(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${value}`);
  }
  return parsed;
}

function parseOptionalBool(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: boolean
): boolean {
  const value = optionalEnv(env, key);
  if (value === undefined) return fallback;
  const normalized = value.toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false), received: ${value}`);
}

export type SmtpConfig = {
  host: string;
  port: number;
  user?: string;
  pass?: string;
  secure: boolean;
  from: string;
};

export type RelayConfig = {
  host: string;
  port: number;
  databaseUrl?: string;
  defaultPreference: boolean;
  transportTimeoutMs: number;
  transportMaxTries: number;
  slackToken?: string;
  /** The `namespace/kind` of the recipient identifier Slack messages go to. */
  slackIdentifier: string;
  smtp?: SmtpConfig;
  githubWebhookSecret?: string;
  gitlabWebhookToken?: string;
};

function loadSmtpConfig(env: NodeJS.ProcessEnv): SmtpConfig | undefined {
  const host = optionalEnv(env, "SMTP_HOST");
  if (host === undefined) return undefined;
  return {
    host,
    port: parsePositiveInt("SMTP_PORT", requireEnv(env, "SMTP_PORT")),
    user: optionalEnv(env, "SMTP_USER"),
    pass: optionalEnv(env, "SMTP_PASS"),
    secure: parseOptionalBool(env, "SMTP_SECURE", true),
    from: requireEnv(env, "EMAIL_FROM")
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  return {
    host: optionalEnv(env, "HOST") ?? "0.0.0.0",
    port: parsePositiveInt("PORT", optionalEnv(env, "PORT") ?? "8000"),
    databaseUrl: optionalEnv(env, "DATABASE_URL"),
    defaultPreference: parseOptionalBool(env, "DEFAULT_PREFERENCE", true),
    transportTimeoutMs: parsePositiveInt(
      "TRANSPORT_TIMEOUT_MS",
      optionalEnv(env, "TRANSPORT_TIMEOUT_MS") ?? "5000"
    ),
    transportMaxTries: parsePositiveInt(
      "TRANSPORT_MAX_TRIES",
      optionalEnv(env, "TRANSPORT_MAX_TRIES") ?? "3"
    ),
    slackToken: optionalEnv(env, "SLACK_TOKEN"),
    slackIdentifier: optionalEnv(env, "SLACK_IDENTIFIER") ?? "slack.com/id",
    smtp: loadSmtpConfig(env),
    githubWebhookSecret: optionalEnv(env, "GITHUB_WEBHOOK_SECRET"),
    gitlabWebhookToken: optionalEnv(env, "GITLAB_WEBHOOK_TOKEN")
  };
}
