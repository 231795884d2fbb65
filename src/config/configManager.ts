import { defaultSecretStore, type SecretStore } from "../storage/secretStore.js";

export interface RetryPolicyConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
}

export interface HttpClientConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly rateLimitPerSecond: number;
  readonly retry: RetryPolicyConfig;
}

export interface MetaApiIntegrationConfig {
  readonly token: string;
  readonly accountId: string;
  readonly allowedAccountLogin: number;
  readonly provisioningApi: HttpClientConfig;
  readonly clientApi: HttpClientConfig;
  /** When unset the client URL is derived from the account region. */
  readonly clientBaseUrlOverride?: string;
  readonly connectTimeoutMs: number;
  readonly synchronizeTimeoutMs: number;
  readonly pollIntervalMs: number;
}

export interface TelegramIntegrationConfig {
  readonly token: string;
  readonly authorizedUser: string;
  readonly api: HttpClientConfig;
}

export interface WebhookConfig {
  readonly appUrl: string;
  readonly port: number;
}

export interface BotConfig {
  readonly metaApi: MetaApiIntegrationConfig;
  readonly telegram: TelegramIntegrationConfig;
  readonly webhook: WebhookConfig;
  readonly riskFraction: number;
  readonly dataDir?: string;
}

export interface ConfigProvider {
  getBotConfig(): BotConfig;
}

export class ConfigurationError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function buildHttpConfig(
  env: NodeJS.ProcessEnv,
  prefix: string,
  defaults: HttpClientConfig,
): HttpClientConfig {
  const baseUrl = env[`${prefix}_BASE_URL`] ?? defaults.baseUrl;
  const timeoutMs = parseNumber(env[`${prefix}_TIMEOUT_MS`], defaults.timeoutMs);
  const rateLimitPerSecond = parseNumber(
    env[`${prefix}_RATE_LIMIT_PER_SECOND`],
    defaults.rateLimitPerSecond,
  );
  const maxAttempts = parseNumber(env[`${prefix}_RETRY_MAX_ATTEMPTS`], defaults.retry.maxAttempts);
  const initialDelayMs = parseNumber(
    env[`${prefix}_RETRY_INITIAL_DELAY_MS`],
    defaults.retry.initialDelayMs,
  );
  const backoffMultiplier = parseNumber(
    env[`${prefix}_RETRY_BACKOFF_MULTIPLIER`],
    defaults.retry.backoffMultiplier,
  );
  const maxDelayMs = parseNumber(
    env[`${prefix}_RETRY_MAX_DELAY_MS`],
    defaults.retry.maxDelayMs,
  );

  return {
    baseUrl,
    timeoutMs,
    rateLimitPerSecond,
    retry: {
      maxAttempts,
      initialDelayMs,
      backoffMultiplier,
      maxDelayMs,
    },
  };
}

const DEFAULT_PROVISIONING_HTTP: HttpClientConfig = {
  baseUrl: "https://mt-provisioning-api-v1.agiliumtrade.agiliumtrade.ai/",
  timeoutMs: 30_000,
  rateLimitPerSecond: 2,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 500,
    backoffMultiplier: 2,
    maxDelayMs: 5_000,
  },
};

const DEFAULT_CLIENT_HTTP: HttpClientConfig = {
  baseUrl: "https://mt-client-api-v1.new-york.agiliumtrade.ai/",
  timeoutMs: 60_000,
  rateLimitPerSecond: 5,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 500,
    backoffMultiplier: 2,
    maxDelayMs: 8_000,
  },
};

const DEFAULT_TELEGRAM_HTTP: HttpClientConfig = {
  baseUrl: "https://api.telegram.org/",
  timeoutMs: 10_000,
  rateLimitPerSecond: 20,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 250,
    backoffMultiplier: 2,
    maxDelayMs: 4_000,
  },
};

const DEFAULT_PORT = 8443;
const DEFAULT_WAIT_TIMEOUT_MS = 300_000;
const DEFAULT_POLL_INTERVAL_MS = 1_000;

export class ConfigManager implements ConfigProvider {
  constructor(
    private readonly secretStore: SecretStore = defaultSecretStore,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  getBotConfig(): BotConfig {
    return {
      metaApi: this.getMetaApiConfig(),
      telegram: this.getTelegramConfig(),
      webhook: {
        appUrl: this.requireValue("APP_URL"),
        port: this.parsePort(),
      },
      riskFraction: this.parseRiskFraction(),
      dataDir: this.env.BOT_DATA_DIR?.trim() || undefined,
    };
  }

  getMetaApiConfig(): MetaApiIntegrationConfig {
    const token = this.requireSecret("METAAPI_TOKEN");
    const accountId = this.requireValue("METAAPI_ACCOUNT_ID");
    const rawLogin = this.requireValue("ALLOWED_ACCOUNT_NUMBER");
    if (!/^\d+$/.test(rawLogin)) {
      throw new ConfigurationError(
        "ALLOWED_ACCOUNT_NUMBER",
        `ALLOWED_ACCOUNT_NUMBER must be a numeric MetaTrader login, received "${rawLogin}"`,
      );
    }

    return {
      token,
      accountId,
      allowedAccountLogin: Number.parseInt(rawLogin, 10),
      provisioningApi: buildHttpConfig(this.env, "METAAPI_PROVISIONING", DEFAULT_PROVISIONING_HTTP),
      clientApi: buildHttpConfig(this.env, "METAAPI_CLIENT", DEFAULT_CLIENT_HTTP),
      clientBaseUrlOverride: this.env.METAAPI_CLIENT_BASE_URL?.trim() || undefined,
      connectTimeoutMs: parseNumber(this.env.METAAPI_CONNECT_TIMEOUT_MS, DEFAULT_WAIT_TIMEOUT_MS),
      synchronizeTimeoutMs: parseNumber(this.env.METAAPI_SYNC_TIMEOUT_MS, DEFAULT_WAIT_TIMEOUT_MS),
      pollIntervalMs: parseNumber(this.env.METAAPI_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
    };
  }

  getTelegramConfig(): TelegramIntegrationConfig {
    const token = this.requireSecret("TELEGRAM_BOT_TOKEN");
    const authorizedUser = this.requireValue("TELEGRAM_AUTHORIZED_USER").replace(/^@/, "");
    return {
      token,
      authorizedUser,
      api: buildHttpConfig(this.env, "TELEGRAM", DEFAULT_TELEGRAM_HTTP),
    };
  }

  private parseRiskFraction(): number {
    const raw = this.requireValue("RISK_FRACTION");
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0 || value > 1) {
      throw new ConfigurationError(
        "RISK_FRACTION",
        `RISK_FRACTION must be a decimal greater than 0 and at most 1, received "${raw}"`,
      );
    }
    return value;
  }

  private parsePort(): number {
    const raw = this.env.PORT?.trim();
    if (!raw) {
      return DEFAULT_PORT;
    }
    const port = Number.parseInt(raw, 10);
    if (!Number.isInteger(port) || port <= 0 || port > 65_535 || String(port) !== raw) {
      throw new ConfigurationError("PORT", `PORT must be an integer between 1 and 65535, received "${raw}"`);
    }
    return port;
  }

  private requireSecret(key: string): string {
    const value = this.secretStore.getSecret(key);
    if (value === undefined) {
      throw new ConfigurationError(key, `Missing required secret: ${key}`);
    }
    return value;
  }

  private requireValue(key: string): string {
    const value = this.env[key]?.trim();
    if (!value) {
      throw new ConfigurationError(key, `Missing required environment variable: ${key}`);
    }
    return value;
  }
}

export const defaultConfigManager = new ConfigManager();

export function getBotConfig(): BotConfig {
  return defaultConfigManager.getBotConfig();
}
