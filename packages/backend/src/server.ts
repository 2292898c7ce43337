import { appConfig } from "./config.js";
import { createApp } from "./app.js";
import { ensureGraphStoreConnected } from "./runtime/graphRuntime.js";
import { logger } from "./utils/logger.js";

const app = createApp();

void ensureGraphStoreConnected().then(
  () => {
    logger.info("Connected to Neo4j");
  },
  (error: unknown) => {
    logger.fatal({ err: error }, "Neo4j connection failed, question answering is unavailable");
  }
);

app.listen(appConfig.PORT, () => {
  logger.info(`GraphQA backend is running on http://localhost:${appConfig.PORT}`);
});
