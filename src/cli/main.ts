import { Command, InvalidArgumentError } from "commander";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import { env } from "../shared/config/env";
import { SOURCES } from "../shared/config/sources";
import { logger } from "../shared/logger/logger";
import {
  buildStatusReport,
  describeStore,
  formatRunHistory,
  formatRunSummary,
  formatSources,
} from "./format";

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

/**
 * Opens the runtime for one command and always releases the store afterwards.
 */
const withRuntime = async (
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

export const buildCli = () => {
  const cli = new Command();
  cli.name("ringside-wire").description("Combat sports news pipeline CLI");

  cli
    .command("run", { isDefault: true })
    .description("Ingest every source once, then rebuild the site")
    .action(() =>
      withRuntime(async (runtime) => {
        const result = await runtime.ingestionService.run();

        console.log(formatRunSummary(result.summary));
        console.log(
          `DB: ${describeStore(env.STORE_PROVIDER, env.POSTGRES_URL)} | Site: ${result.site.path} | Probe: ${result.probePath}`,
        );
      }),
    );

  cli
    .command("site")
    .description("Rebuild the site from stored articles without fetching")
    .action(() =>
      withRuntime(async (runtime) => {
        const site = await runtime.siteService.publish();
        console.log(`Site: ${site.path} (${site.articleCount} items)`);
      }),
    );

  cli
    .command("runs")
    .description("Show the most recent run summaries")
    .option("--limit <n>", "Number of runs to show", parsePositiveInt, 10)
    .action((opts: { limit: number }) =>
      withRuntime(async (runtime) => {
        console.log(formatRunHistory(await runtime.runRepo.latest(opts.limit)));
      }),
    );

  cli
    .command("sources")
    .description("List the configured sources")
    .action(() => {
      console.log(formatSources(SOURCES));
    });

  cli
    .command("status")
    .description("Report pipeline configuration")
    .action(() => {
      logger.info(buildStatusReport(env, SOURCES), "Runtime status");
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
