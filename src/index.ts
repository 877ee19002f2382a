import { config } from "@/config/config";
import { createAppContext } from "@/context";
import { logErrorEvent } from "@/monitoring/errorLogService";
import { createServer } from "@/server";
import { logger } from "@/utils/logger";

async function start() {
  const context = createAppContext(config);

  try {
    await context.jobService.scheduleStoredJobs();
    context.scheduler.start();

    const server = await createServer(context);
    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Backend listening on http://${config.server.host}:${config.server.port}`);

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals) => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info("Shutdown signal received", { signal });

      try {
        await server.close();
        await context.scheduler.stop(true);
        logger.info("Shutdown complete");
        process.exit(0);
      } catch (error) {
        logErrorEvent(error, { message: "Error during shutdown", service: "lifecycle" });
        process.exit(1);
      }
    };

    process.once("SIGTERM", (signal) => void shutdown(signal));
    process.once("SIGINT", (signal) => void shutdown(signal));
  } catch (error) {
    logErrorEvent(error, { message: "Failed to start backend", service: "lifecycle" });
    await context.scheduler.stop(false);
    process.exit(1);
  }
}

void start();
