import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
const app = buildApp(config, { logger });

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info({ host: config.host, port: config.port, risk_provider: config.riskProvider }, "Decision engine listening");
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "Failed to start decision engine");
    process.exit(1);
  });
