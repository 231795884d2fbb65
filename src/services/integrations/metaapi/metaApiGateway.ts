import type { HttpClientConfig, MetaApiIntegrationConfig } from "../../../config/configManager.js";
import { createLogger, describeError, type Logger } from "../../../telemetry/logger.js";
import {
  GatewayError,
  isAccountDeploymentState,
  TradeRejectedError,
  type AccountDeploymentState,
  type AccountInformation,
  type BrokerageAccount,
  type BrokerageConnection,
  type BrokerageGateway,
  type OrderRequest,
  type PendingOrderRequest,
  type SymbolPrice,
  type TradeResult,
} from "../../../trading/brokerageGateway.js";
import type { OrderType } from "../../../trading/tradeIntent.js";
import { RetryingHttpClient } from "../http/retryingHttpClient.js";

export type ConnectionStatus = "CONNECTED" | "DISCONNECTED" | "DISCONNECTED_FROM_BROKER";

const ACTION_TYPES = {
  Buy: "ORDER_TYPE_BUY",
  Sell: "ORDER_TYPE_SELL",
  "Buy Limit": "ORDER_TYPE_BUY_LIMIT",
  "Sell Limit": "ORDER_TYPE_SELL_LIMIT",
  "Buy Stop": "ORDER_TYPE_BUY_STOP",
  "Sell Stop": "ORDER_TYPE_SELL_STOP",
} as const satisfies Record<OrderType, string>;

// ERR_NO_ERROR, TRADE_RETCODE_PLACED, TRADE_RETCODE_DONE, TRADE_RETCODE_DONE_PARTIAL, TRADE_RETCODE_NO_CHANGES
const SUCCESS_TRADE_CODES: ReadonlySet<number> = new Set([0, 10008, 10009, 10010, 10025]);

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(payload: Record<string, unknown>, key: string, context: string): number {
  const value = payload[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new GatewayError(`MetaApi ${context} response is missing numeric field "${key}"`);
  }
  return value;
}

function readOptionalString(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function authHeaders(token: string, withBody = false): Record<string, string> {
  const headers: Record<string, string> = {
    "auth-token": token,
    Accept: "application/json",
  };
  if (withBody) {
    headers["Content-Type"] = "application/json";
  }
  return headers;
}

function accountPath(accountId: string, suffix = ""): string {
  return `users/current/accounts/${encodeURIComponent(accountId)}${suffix}`;
}

export function regionClientBaseUrl(region: string): string {
  return `https://mt-client-api-v1.${region}.agiliumtrade.ai/`;
}

function isPendingOrder(request: OrderRequest): request is PendingOrderRequest {
  return request.orderType !== "Buy" && request.orderType !== "Sell";
}

export function buildTradePayload(request: OrderRequest): Record<string, string | number> {
  const payload: Record<string, string | number> = {
    actionType: ACTION_TYPES[request.orderType],
    symbol: request.symbol,
    volume: request.volume,
  };
  if (isPendingOrder(request)) {
    payload.openPrice = request.openPrice;
  }
  payload.stopLoss = request.stopLoss;
  payload.takeProfit = request.takeProfit;
  return payload;
}

interface AccountSnapshot {
  readonly id: string;
  readonly state: AccountDeploymentState;
  readonly connectionStatus?: string;
  readonly region?: string;
}

function parseAccountSnapshot(payload: unknown, accountId: string): AccountSnapshot {
  if (!isRecord(payload)) {
    throw new GatewayError(`MetaApi returned an unreadable account description for ${accountId}`);
  }
  const state = payload.state;
  if (!isAccountDeploymentState(state)) {
    throw new GatewayError(`MetaApi account ${accountId} reported unknown state "${String(state)}"`);
  }
  return {
    id: readOptionalString(payload, "_id") ?? accountId,
    state,
    connectionStatus: readOptionalString(payload, "connectionStatus"),
    region: readOptionalString(payload, "region"),
  };
}

interface WaitOptions {
  readonly timeoutMs: number;
  readonly pollIntervalMs: number;
}

class MetaApiProvisioningClient {
  constructor(
    private readonly http: RetryingHttpClient,
    private readonly token: string,
  ) {}

  async fetchAccount(accountId: string): Promise<AccountSnapshot> {
    const payload = await this.http.get<unknown>(accountPath(accountId), {
      headers: authHeaders(this.token),
    });
    return parseAccountSnapshot(payload, accountId);
  }

  async deploy(accountId: string): Promise<void> {
    await this.http.send(accountPath(accountId, "/deploy"), {
      method: "POST",
      headers: authHeaders(this.token),
      expectedStatuses: [200, 204],
    });
  }
}

export class MetaApiAccount implements BrokerageAccount {
  constructor(
    private readonly snapshot: AccountSnapshot,
    private readonly provisioning: MetaApiProvisioningClient,
    private readonly waits: WaitOptions,
    private readonly logger: Logger,
  ) {}

  get id(): string {
    return this.snapshot.id;
  }

  get state(): AccountDeploymentState {
    return this.snapshot.state;
  }

  get region(): string | undefined {
    return this.snapshot.region;
  }

  async deploy(): Promise<void> {
    this.logger.debug("Requesting deployment", { accountId: this.id, state: this.state });
    await this.provisioning.deploy(this.id);
  }

  async waitConnected(): Promise<void> {
    const deadline = Date.now() + this.waits.timeoutMs;
    let status = this.snapshot.connectionStatus;
    while (status !== "CONNECTED") {
      if (Date.now() >= deadline) {
        throw new GatewayError(
          `Timed out waiting for MetaApi account ${this.id} to connect to the broker (status: ${status ?? "unknown"})`,
        );
      }
      await sleep(this.waits.pollIntervalMs);
      const refreshed = await this.provisioning.fetchAccount(this.id);
      status = refreshed.connectionStatus;
      this.logger.debug("Polled account connection status", { accountId: this.id, status });
    }
  }
}

export class MetaApiConnection implements BrokerageConnection {
  private connected = false;

  constructor(
    private readonly accountId: string,
    private readonly http: RetryingHttpClient,
    private readonly token: string,
    private readonly waits: WaitOptions,
    private readonly logger: Logger,
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
    this.logger.debug("Opened MetaApi connection", { accountId: this.accountId, baseUrl: this.http.baseUrl });
  }

  async waitSynchronized(): Promise<void> {
    this.assertConnected();
    const deadline = Date.now() + this.waits.timeoutMs;
    for (;;) {
      try {
        await this.getAccountInformation();
        return;
      } catch (error) {
        if (Date.now() >= deadline) {
          throw new GatewayError(
            `Timed out waiting for MetaApi account ${this.accountId} to synchronize: ${describeError(error)}`,
            { cause: error },
          );
        }
        this.logger.debug("Terminal state not synchronized yet", { error: describeError(error) });
        await sleep(this.waits.pollIntervalMs);
      }
    }
  }

  async getAccountInformation(): Promise<AccountInformation> {
    this.assertConnected();
    const payload = await this.http.get<unknown>(accountPath(this.accountId, "/account-information"), {
      headers: authHeaders(this.token),
    });
    if (!isRecord(payload)) {
      throw new GatewayError("MetaApi returned unreadable account information");
    }
    return {
      login: readNumber(payload, "login", "account information"),
      balance: readNumber(payload, "balance", "account information"),
      currency: readOptionalString(payload, "currency"),
      broker: readOptionalString(payload, "broker"),
    };
  }

  async getSymbolPrice(symbol: string): Promise<SymbolPrice> {
    this.assertConnected();
    const payload = await this.http.get<unknown>(
      accountPath(this.accountId, `/symbols/${encodeURIComponent(symbol)}/current-price`),
      { headers: authHeaders(this.token) },
    );
    if (!isRecord(payload)) {
      throw new GatewayError(`MetaApi returned an unreadable price for ${symbol}`);
    }
    return {
      symbol: readOptionalString(payload, "symbol") ?? symbol,
      bid: readNumber(payload, "bid", "symbol price"),
      ask: readNumber(payload, "ask", "symbol price"),
    };
  }

  async placeOrder(request: OrderRequest): Promise<TradeResult> {
    this.assertConnected();
    const payload = await this.http.post<unknown>(accountPath(this.accountId, "/trade"), {
      headers: authHeaders(this.token, true),
      body: JSON.stringify(buildTradePayload(request)),
      // a timeout or 5xx may follow an accepted order; resending would open a second position
      retry: false,
    });
    if (!isRecord(payload)) {
      throw new GatewayError("MetaApi returned an unreadable trade response");
    }
    const result: TradeResult = {
      numericCode: readNumber(payload, "numericCode", "trade"),
      stringCode: readOptionalString(payload, "stringCode") ?? "UNKNOWN",
      message: readOptionalString(payload, "message") ?? "",
      orderId: readOptionalString(payload, "orderId"),
    };
    if (!SUCCESS_TRADE_CODES.has(result.numericCode)) {
      throw new TradeRejectedError(
        result.message || `Trade rejected with ${result.stringCode}`,
        result.numericCode,
        result.stringCode,
      );
    }
    return result;
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new GatewayError("MetaApi connection is not open; call connect() first");
    }
  }
}

export interface MetaApiGatewayOptions {
  readonly config: MetaApiIntegrationConfig;
  readonly logger?: Logger;
}

export class MetaApiGateway implements BrokerageGateway {
  private readonly provisioning: MetaApiProvisioningClient;
  private readonly logger: Logger;

  constructor(private readonly options: MetaApiGatewayOptions) {
    this.logger = options.logger ?? createLogger("metaapi");
    const http = new RetryingHttpClient({
      http: options.config.provisioningApi,
      service: "metaapi-provisioning",
      logger: this.logger,
    });
    this.provisioning = new MetaApiProvisioningClient(http, options.config.token);
  }

  async getAccount(accountId: string): Promise<BrokerageAccount> {
    const snapshot = await this.provisioning.fetchAccount(accountId);
    return new MetaApiAccount(
      snapshot,
      this.provisioning,
      { timeoutMs: this.options.config.connectTimeoutMs, pollIntervalMs: this.options.config.pollIntervalMs },
      this.logger,
    );
  }

  openConnection(account: BrokerageAccount): BrokerageConnection {
    const http = new RetryingHttpClient({
      http: this.resolveClientHttpConfig(account instanceof MetaApiAccount ? account.region : undefined),
      service: "metaapi-client",
      logger: this.logger,
    });
    return new MetaApiConnection(
      account.id,
      http,
      this.options.config.token,
      { timeoutMs: this.options.config.synchronizeTimeoutMs, pollIntervalMs: this.options.config.pollIntervalMs },
      this.logger,
    );
  }

  private resolveClientHttpConfig(region: string | undefined): HttpClientConfig {
    const { clientApi, clientBaseUrlOverride } = this.options.config;
    if (clientBaseUrlOverride) {
      return { ...clientApi, baseUrl: clientBaseUrlOverride };
    }
    if (region) {
      return { ...clientApi, baseUrl: regionClientBaseUrl(region) };
    }
    return clientApi;
  }
}
