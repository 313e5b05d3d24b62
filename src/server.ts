/**
 * Application entry point.
 *
 * Loads configuration, builds the dependency container, initializes the
 * vector index and starts the HTTP server. If the index cannot be initialized
 * the server still starts; chat requests then degrade to apologetic or plain
 * completions.
 */
import { loadConfig } from "@config/index";
import { createContainer } from "@container";
import { configureLogger, errorMessage, logger } from "@infrastructure/logging/Logger";
import { createApp } from "@interfaces/http/createApp";
import dotenv from "dotenv";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  configureLogger({
    level: config.observability.logLevel,
    filePath: config.observability.logFile,
  });

  const container = createContainer(config);

  await container.checkConnectivity();

  const ready = await container.orchestrator.initialize();
  if (!ready) {
    logger.log("warn", "RAG service initialization failed, running in fallback mode");
  }

  const server = createApp(container).listen(config.port, () => {
    logger.log("info", "Server running", {
      url: `http://localhost:${config.port}`,
      chatModel: config.openai.model,
      vectorStore: config.vectorStore.provider,
    });
  });

  const shutdown = (signal: string): void => {
    logger.log("info", "Shutting down", { signal });
    server.close(() => {
      container
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.log("error", "Shutdown failed", { message: errorMessage(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.log("error", "Server failed to start", { message: errorMessage(err) });
  process.exit(1);
});
