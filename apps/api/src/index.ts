import { config } from "./config";
import { createApp } from "./app";
import { buildKeyValueStore, buildLocalizer } from "./localizer";
import { connectDatabase, disconnectDatabase, isDatabaseConnected } from "./db/connection";
import { closeRedisConnection, pingRedis } from "./db/redis";

async function checkPersistence(): Promise<boolean> {
  switch (config.cachePersistence) {
    case "mongo":
      return isDatabaseConnected();
    case "redis":
      return pingRedis();
    default:
      return true;
  }
}

// Start server
async function start() {
  if (config.cachePersistence === "mongo") {
    await connectDatabase();
  }

  const localizer = await buildLocalizer(buildKeyValueStore());
  const app = createApp(localizer, {
    corsOrigin: config.corsOrigin,
    persistence: config.cachePersistence,
    checkPersistence,
  });

  const server = app.listen(config.port, () => {
    console.log(`🚀 API server running on http://localhost:${config.port}`);
    console.log(
      `[Translation] provider=${config.translationProvider}, source=${localizer.getSourceLanguage()}, ` +
        `language=${localizer.getLanguage()}, persistence=${config.cachePersistence}`
    );
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close();
    try {
      await localizer.close();
      await closeRedisConnection();
      await disconnectDatabase();
      process.exit(0);
    } catch (error) {
      console.error("Shutdown failed:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

start().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
