import { runCli } from "./cli/main";
import { toErrorDetails } from "./core/entities/appError";
import { logger } from "./shared/logger/logger";

runCli(process.argv).catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
