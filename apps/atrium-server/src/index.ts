import "dotenv/config";
import { initDb, closeDb } from "./db/database.js";
import { createServer } from "./server.js";
import { logger } from "./lib/logger.js";
import config, { usesDefaultSecret } from "./config.js";

async function main() {
  initDb();
  if (usesDefaultSecret()) {
    logger.warn("JWT_SECRET_KEY is not set; using the development secret");
  }

  const { app } = await createServer();
  await app.listen({ port: config.port, host: config.host });
  logger.info(`Listening on ${config.host}:${config.port}`);

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    app.close().then(
      () => {
        closeDb();
        process.exit(0);
      },
      (err: unknown) => {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
