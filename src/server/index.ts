import { config } from "../shared/config.js";
import { logger } from "../shared/logger.js";
import { createCodesService } from "../service.js";
import { createApp } from "./app.js";

const start = () => {
  if (!config.apiKey) {
    console.error("Missing API_KEY in environment");
    process.exit(1);
  }

  const service = createCodesService(config);
  const app = createApp({ store: service.store, orchestrator: service.orchestrator, apiKey: config.apiKey });
  const server = app.listen(config.port, () => {
    logger.info(`API listening on http://localhost:${config.port}`);
  });

  const shutdown = () => {
    server.close(() => {
      service.close().catch((error) => logger.error("Failed to close database", {}, error));
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

start();
