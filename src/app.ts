import { ConfigurationError } from "./config/configManager.js";
import { createTelegramBotRuntime } from "./runtime/botRuntime.js";
import { createServer } from "./server.js";
import { createLogger, describeError } from "./telemetry/logger.js";

const logger = createLogger("bot");

function webhookUrl(appUrl: string, token: string): string {
  return `${appUrl.replace(/\/+$/, "")}/${token}`;
}

async function main() {
  const runtime = createTelegramBotRuntime();
  const { config, controller, journal, telegram } = runtime;

  const app = createServer({
    webhookToken: config.telegram.token,
    onMessage: (message) => controller.handle(message),
    journal,
  });

  await new Promise<void>((resolve) => {
    app.listen(config.webhook.port, "0.0.0.0", () => resolve());
  });
  logger.info("Listening for updates", { port: config.webhook.port });

  await telegram.setWebhook(webhookUrl(config.webhook.appUrl, config.telegram.token));
}

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    logger.error("Invalid configuration", { variable: error.variable, error: error.message });
  } else {
    logger.error("Fatal error", { error: describeError(error) });
  }
  process.exitCode = 1;
});
