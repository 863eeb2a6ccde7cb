import { AnalysisService } from "../services/analysisService";
import { CleaningService } from "../services/cleaningService";
import { ExtractionService } from "../services/extractionService";
import { MetricService } from "../services/metricService";
import { PipelineOrchestratorService } from "../services/pipelineOrchestratorService";
import { ValidationService } from "../services/validationService";
import {
  buildPipelineConfig,
  env,
  type PipelineConfig,
} from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { MockCatalogProvider } from "../../infra/providers/mocks/mockCatalogProvider";
import { TmdbCatalogProvider } from "../../infra/providers/tmdb/tmdbCatalogProvider";
import { FileStageStore } from "../../infra/storage/fileStageStore";
import {
  SystemClock,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import type { CatalogProviderPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";

const createCatalogProvider = (
  config: Readonly<PipelineConfig>,
  clock: ClockPort,
): CatalogProviderPort => {
  if (config.catalog.provider === "tmdb") {
    return new TmdbCatalogProvider(config.catalog, clock);
  }

  return new MockCatalogProvider();
};

/**
 * Composition root shared by every CLI command.
 */
export const createRuntime = (
  config: Readonly<PipelineConfig> = buildPipelineConfig(env),
) => {
  if (config.rejectedRecordIds.length > 0) {
    logger.warn(
      { rejected: config.rejectedRecordIds },
      "Ignoring record identifiers that are not positive integers",
    );
  }

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();

  const provider = createCatalogProvider(config, clock);
  const store = new FileStageStore(config.dataDir);

  const validator = new ValidationService(config.outlierIqrMultiple);
  const extractionService = new ExtractionService(
    provider,
    clock,
    config.catalog.requestDelayMs,
  );
  const cleaningService = new CleaningService(validator);
  const metricService = new MetricService(validator, config.roiMinBudgetMusd);
  const analysisService = new AnalysisService(config.topN);

  const orchestratorService = new PipelineOrchestratorService(
    extractionService,
    cleaningService,
    metricService,
    analysisService,
    store,
    clock,
    ids,
    {
      recordIds: config.recordIds,
      skipExisting: config.skipExisting,
      minQualityScore: config.minQualityScore,
    },
  );

  return {
    config,
    store,
    analysisService,
    orchestratorService,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
