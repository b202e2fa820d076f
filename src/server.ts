import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  const server = app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv, rubricPath: env.rubricPath });
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    server.close((error) => {
      if (error) {
        logger.error("Server close failed", { error: error.message });
        process.exitCode = 1;
      }
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

bootstrap();
