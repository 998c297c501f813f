import { createBeerClient } from "./beer";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { createApp } from "./server";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const app = createApp({
  fetchPage: createBeerClient({
    baseUrl: config.beerApiUrl,
    perPage: config.perPage,
    timeoutMs: config.fetchTimeoutMs,
  }),
  minAbv: config.minAbv,
  maxPages: config.maxPages,
  logger,
});

const server = app.listen(config.port, () => {
  logger.info(
    { port: config.port, upstream: config.beerApiUrl },
    "Listening",
  );
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "Shutting down");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "Error while closing server");
      process.exitCode = 1;
    }
  });
}

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);
