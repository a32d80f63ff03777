import { Server } from "http";
import { loadConfig } from "@config/config";
import { connectDB, disconnectDB } from "@config/database";
import { logger } from "@config/logger";
import { registerEventLogging } from "@core/events/event-logger";
import { CacheService } from "@core/services/cache.service";
import { SchedulerService } from "@features/shared/services/scheduler.service";
import { buildApp } from "./app";
import { createServices } from "./services";

export async function startServer(): Promise<void> {
  const config = loadConfig();
  const shutdown = new AbortController();

  await connectDB(config.MONGODB_URI);
  await CacheService.initialize({ host: config.REDIS_HOST, port: config.REDIS_PORT });
  registerEventLogging();

  const services = createServices(config, shutdown.signal);
  services.transport.startCleanupInterval();

  const scheduler = new SchedulerService(services.campaigns);
  scheduler.initializeScheduledTasks();

  const app = buildApp(services);
  const server: Server = app.listen(config.PORT, () => {
    logger.info(`Server running on port ${config.PORT}`);
    logger.info(`Swagger documentation available at ${config.PUBLIC_BASE_URL}/api-docs`);
  });

  let stopping = false;
  const stop = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    shutdown.abort();
    server.close();
    try {
      await scheduler.shutdown();
      services.transport.close();
      await CacheService.disconnect();
      await disconnectDB();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void stop("SIGTERM"));
  process.on("SIGINT", () => void stop("SIGINT"));
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error("Failed to start server:", error);
    process.exit(1);
  });
}
