import { getBotConfig, type MetaApiIntegrationConfig } from "../../../config/configManager.js";
import type { Logger } from "../../../telemetry/logger.js";
import { MetaApiGateway } from "./metaApiGateway.js";

export interface CreateMetaApiGatewayOptions {
  readonly config?: MetaApiIntegrationConfig;
  readonly logger?: Logger;
}

export function createMetaApiGateway(options: CreateMetaApiGatewayOptions = {}): MetaApiGateway {
  const config = options.config ?? getBotConfig().metaApi;
  return new MetaApiGateway({ config, logger: options.logger });
}

export { MetaApiAccount, MetaApiConnection, MetaApiGateway, buildTradePayload } from "./metaApiGateway.js";
