import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";
import { toErrorDetails } from "./shared/logger/errorDetails";

runCli(process.argv).catch((error: unknown) => {
  logger.error({ error: toErrorDetails(error) }, "ringside-wire command failed");
  process.exitCode = 1;
});
