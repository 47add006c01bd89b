import { createApp } from "./app";
import { loadConfigFromDotenv } from "./config";
import { Database, createPool } from "./db";

async function main() {
  const config = loadConfigFromDotenv();
  const database = new Database(
    createPool(config),
    config.poolConnectionTimeoutMs,
    config.poolMaxSize
  );

  if (config.poolMinConnections > 0) {
    await database.warm(config.poolMinConnections);
  }

  const app = createApp({ database, logQueries: config.logQueries });

  const server = app.listen(config.port, () => {
    console.log(`[server] Server running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      database.close().then(
        () => process.exit(0),
        (error) => {
          console.error("[server] Error closing pool:", error);
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("[server] Failed to start:", error);
  process.exit(1);
});
