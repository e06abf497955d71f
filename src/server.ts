import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { connect } from "./negotiate.js";
import { probe } from "./probe.js";

const config = loadConfig();
logger.level = config.logLevel;

if (!config.apiKey) {
  logger.warn("NEGOTIATOR_API_KEY is not set; every authenticated route will answer 401");
}

const app = createApp({
  apiKey: config.apiKey,
  timeoutMs: config.connectTimeoutMs,
  allowInsecureLoopback: config.allowInsecureLoopback,
  negotiate: connect,
  probe,
});

app.listen(config.port, () => {
  logger.info({ port: config.port }, "negotiator listening");
});
