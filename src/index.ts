import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
const app = buildApp(config, { logger });

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info(
      { host: config.host, port: config.port, store_backend: config.storeBackend },
      "dispute case API listening",
    );
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start dispute case API");
    process.exit(1);
  });
