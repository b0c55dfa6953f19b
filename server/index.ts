import "dotenv/config";

import { createApp, createServices } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./log";
import { registerRoutes } from "./routes";

const config = loadConfig();
const logger = createLogger("express", config.logLevel);

const services = createServices(config, logger);
const app = createApp(logger);
const server = await registerRoutes(app, services);

server.listen(config.port, config.host, () => {
  logger.info(`${config.appName} ${config.version} serving on ${config.host}:${config.port}`);
  logger.info(`upstream portal: ${config.upstreamBaseUrl}`);
});
