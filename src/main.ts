import { loadConfig, toCorsOptions } from "./infrastructure/config/config.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createCors } from "./presentation/middleware/cors.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

/**
 * Bootstrap — read env config, compile the CORS policy once, start the
 * demo server. Fails fast on misconfiguration.
 */
const bootstrap = (): void => {
  const bootStart = performance.now();

  const config = loadConfig();
  const logger = createLogger(config.log.level, {}, config.log.format);
  const cors = createCors({
    ...toCorsOptions(config),
    logger: logger.child({ component: "cors" }),
  });

  const server = createServer({ config, logger, cors });

  server.listen(config.port, config.host, () => {
    printStartupBanner({
      config,
      policy: cors.policy,
      bootTimeMs: performance.now() - bootStart,
    });
  });

  const shutdown = (signal: string): void => {
    printShutdown(signal);
    server.close((e) => {
      if (e) {
        logger.error("Server close failed", { error: e.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

bootstrap();
