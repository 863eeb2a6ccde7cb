import { Command } from "commander";
import type { Result } from "neverthrow";
import { createRuntime, type Runtime } from "../application/bootstrap/runtimeFactory";
import type {
  PipelineRun,
  PipelineRunFailure,
  StageName,
} from "../core/entities/pipeline";
import { parseRecordIds } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatRunReport, formatSearchResults } from "./formatRunReport";

type RunCommandOptions = {
  ids?: string;
  skipExisting?: boolean;
  prettify?: boolean;
};

type SearchCommandOptions = {
  actor: string;
  genre?: string;
  director?: string;
  limit?: string;
  prettify?: boolean;
};

const resolveRecordIds = (raw: string | undefined): number[] | undefined => {
  if (raw === undefined) {
    return undefined;
  }

  const { ids, rejected } = parseRecordIds(raw);
  if (rejected.length > 0) {
    logger.warn({ rejected }, "Ignoring record identifiers that are not positive integers");
  }
  return ids;
};

const reportRun = (
  result: Result<PipelineRun, PipelineRunFailure>,
  prettify: boolean,
): void => {
  const run = result.isOk() ? result.value : result.error.run;

  if (prettify) {
    console.log(formatRunReport(run));
  } else {
    logger.info({ run }, "Run summary");
  }

  if (result.isErr()) {
    process.exitCode = 1;
  }
};

const withRunOptions = (command: Command): Command =>
  command
    .option("--ids <ids>", "Comma-separated record identifiers")
    .option("--skip-existing", "Reuse complete persisted stage artifacts")
    .option("--no-skip-existing", "Recompute stages even when artifacts exist")
    .option("--prettify", "Render a human-friendly run report");

const addStageCommand = (
  cli: Command,
  stage: StageName,
  description: string,
  runtime: () => Runtime,
): void => {
  withRunOptions(cli.command(stage).description(description)).action(
    async (opts: RunCommandOptions) => {
      const result = await runtime().orchestratorService.runStage(stage, {
        recordIds: resolveRecordIds(opts.ids),
        skipExisting: opts.skipExisting,
      });
      reportRun(result, Boolean(opts.prettify));
    },
  );
};

/**
 * One command surface for full runs, single stages and read-only queries.
 */
export const buildCli = (runtime: () => Runtime = createRuntime) => {
  const cli = new Command();
  cli
    .name("catalog-pipeline")
    .description("Catalog ingestion, validation and metrics pipeline");

  withRunOptions(
    cli.command("run").description("Run extract, clean, metrics and analyze"),
  ).action(async (opts: RunCommandOptions) => {
    const result = await runtime().orchestratorService.run({
      recordIds: resolveRecordIds(opts.ids),
      skipExisting: opts.skipExisting,
    });
    reportRun(result, Boolean(opts.prettify));
  });

  addStageCommand(cli, "extract", "Fetch records from the catalog", runtime);
  addStageCommand(cli, "clean", "Clean the persisted extract artifact", runtime);
  addStageCommand(cli, "metrics", "Derive profit and ROI from the clean artifact", runtime);
  addStageCommand(cli, "analyze", "Write the analysis report from the metrics artifact", runtime);

  cli
    .command("search")
    .description("Query the persisted metrics table")
    .requiredOption("--actor <name>", "Cast member to match")
    .option("--genre <genres>", "Comma-separated genres that must all match")
    .option("--director <name>", "Director to match; sorts by runtime, longest first")
    .option("--limit <count>", "Maximum number of results")
    .option("--prettify", "Render a numbered list")
    .action(async (opts: SearchCommandOptions) => {
      const { store, analysisService } = runtime();
      const metrics = await store.load("metrics");
      if (metrics.isErr()) {
        logger.error({ code: metrics.error.code }, metrics.error.message);
        process.exitCode = 1;
        return;
      }

      const limit = opts.limit === undefined ? undefined : Number(opts.limit);
      if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
        logger.error({ limit: opts.limit }, "--limit must be a positive integer");
        process.exitCode = 1;
        return;
      }

      const rows = metrics.value.rows;
      const matches = opts.director
        ? analysisService.searchByCastAndDirector(rows, {
            actor: opts.actor,
            director: opts.director,
            limit,
          })
        : analysisService.searchByGenreAndCast(rows, {
            genres: (opts.genre ?? "")
              .split(",")
              .map((genre) => genre.trim())
              .filter(Boolean),
            actor: opts.actor,
            limit,
          });

      if (opts.prettify) {
        console.log(formatSearchResults(matches));
      } else {
        logger.info({ count: matches.length, matches }, "Search results");
      }
    });

  cli
    .command("status")
    .description("Report configuration and which stages are complete")
    .action(async () => {
      const { config, store } = runtime();
      const [extract, clean, metrics] = await Promise.all([
        store.has("extract"),
        store.has("clean"),
        store.has("metrics"),
      ]);

      logger.info(
        {
          provider: config.catalog.provider,
          baseUrl: config.catalog.baseUrl,
          credentialConfigured: config.catalog.apiKey.length > 0,
          recordCount: config.recordIds.length,
          dataDir: config.dataDir,
          skipExisting: config.skipExisting,
          minQualityScore: config.minQualityScore,
          roiMinBudgetMusd: config.roiMinBudgetMusd,
          completeStages: { extract, clean, metrics },
        },
        "Pipeline status",
      );
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
