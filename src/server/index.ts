import "dotenv/config";
import { loadConfig, resolvePolicy } from "../config/index.js";
import { createApp } from "./app.js";
import { logger, serializeError, setLogLevel } from "./logger.js";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const { policy, maxDepth } = await resolvePolicy(config);

  const app = createApp({
    apiPrefix: config.apiPrefix,
    apiKey: config.apiKey,
    maxDepth,
    policy,
  });

  app.listen(config.port, () => {
    logger.info("semjson API listening", {
      port: config.port,
      apiPrefix: config.apiPrefix,
      maxDepth,
      optionalFields: Array.from(policy.optionalFields),
      apiKeyRequired: Boolean(config.apiKey),
    });
  });
}

main().catch((e) => {
  logger.error("Failed to start API", { error: serializeError(e) });
  process.exit(1);
});
