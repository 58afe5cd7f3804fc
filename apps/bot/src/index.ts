// bot.js loads env.local (through config.js) before the logger reads LOG_LEVEL.
import { startBot } from "./bot.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

process.on("unhandledRejection", (reason) => {
  logger.error({ evt: "unhandled_rejection", err: errorMessage(reason) }, "unhandled rejection");
});

try {
  await startBot();
} catch (e) {
  logger.fatal({ evt: "startup_failed", err: errorMessage(e) }, "bot failed to start");
  process.exit(1);
}
