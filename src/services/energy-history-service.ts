import { Logger, createFallbackLogger } from '../util/logger';
import { AppError, ErrorCategory, ErrorHandler, describeError } from '../util/error-handler';
import { formatRange, parseIsoDate, today } from '../util/date-range';
import { validateOneOf } from '../util/validation';
import { PipelineConfig } from '../config/pipeline-config';
import { ENERGY_CONVERSION } from '../constants/monitoring-api';
import { MonitoringApi, MonitoringClient } from './monitoring-api';
import { ChunkFetcher } from './chunk-fetcher';
import { planChunks } from './chunk-planner';
import { CoordinatorOptions, RetryCoordinator } from './retry-coordinator';
import { assembleDataset } from './dataset-assembler';
import { FetchResultCache } from './fetch-result-cache';
import {
  EnergyFetchResult,
  EnvBenefits,
  IsoDate,
  SiteOverview,
  SiteSummary,
  TIME_UNITS,
  TimeUnit
} from '../types';

export interface EnergyHistoryDependencies {
  client?: MonitoringClient;
  cache?: FetchResultCache;
  /** Clock used to decide whether a range is still open */
  now?: () => Date;
}

export type FetchEnergyOptions = CoordinatorOptions;

/**
 * Trees-planted equivalent of saved CO2 (kg)
 */
export function treesEquivalent(co2Kg: number): number {
  return co2Kg > 0 ? Math.round(co2Kg / ENERGY_CONVERSION.CO2_KG_PER_TREE) : 0;
}

/**
 * Entry point of the fetch pipeline: plan, fetch with fallback, assemble,
 * memoize. Also serves the best-effort site overview reads.
 */
export class EnergyHistoryService {
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly client: MonitoringClient;
  private readonly coordinator: RetryCoordinator;
  private readonly cache: FetchResultCache;
  private readonly now: () => Date;

  constructor(
    private readonly config: PipelineConfig,
    logger?: Logger,
    dependencies: EnergyHistoryDependencies = {}
  ) {
    this.logger = logger || createFallbackLogger('EnergyHistory');
    this.errorHandler = new ErrorHandler(this.logger);
    this.client = dependencies.client ?? new MonitoringApi(config, this.logger);
    this.coordinator = new RetryCoordinator(new ChunkFetcher(this.client, this.logger), this.logger);
    this.cache = dependencies.cache ?? new FetchResultCache();
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Fetch a normalized dataset for an inclusive date range. Remote failures
   * come back as warnings; a start after the end yields an empty dataset.
   * @throws AppError (VALIDATION) for an unknown time unit or malformed date
   */
  async fetchEnergy(
    timeUnit: TimeUnit,
    start: IsoDate,
    end: IsoDate,
    options: FetchEnergyOptions = {}
  ): Promise<EnergyFetchResult> {
    validateOneOf(timeUnit, 'timeUnit', TIME_UNITS);
    parseIsoDate(start, 'start');
    parseIsoDate(end, 'end');

    const cached = this.cache.get(timeUnit, start, end);
    if (cached) {
      this.logger.pipeline(`Cache hit for ${timeUnit} ${start}..${end}`);
      return { ...cached, fromCache: true };
    }

    const range = { start, end };
    const chunks = planChunks(range, this.config.maxChunkDays);
    this.logger.pipeline(`Fetching ${timeUnit} ${formatRange(range)}`, { chunks: chunks.length });

    const outcome = await this.coordinator.run(timeUnit, chunks, options);
    const result: EnergyFetchResult = {
      timeUnit,
      range,
      dataset: assembleDataset(outcome.contributions),
      warnings: outcome.warnings,
      chunks,
      cancelled: outcome.cancelled,
      fromCache: false
    };

    this.logger.pipeline(`Fetched ${result.dataset.length} rows for ${formatRange(range)}`, {
      warnings: result.warnings.length,
      cancelled: result.cancelled
    });

    if (this.isCacheable(result)) {
      this.cache.set(result);
    }

    return result;
  }

  /**
   * Overview and environmental benefits, each read best-effort
   */
  async getSiteSummary(): Promise<SiteSummary> {
    const { summary } = await this.readSiteSummary();
    return summary;
  }

  /**
   * Site summary, or a hard error when neither best-effort read succeeds
   * (backend unreachable or credentials rejected).
   * @throws AppError (not recoverable)
   */
  async verifyConnectivity(): Promise<SiteSummary> {
    const { summary, failures } = await this.readSiteSummary();
    if (summary.overview === null && summary.envBenefits === null) {
      const category = failures.includes(ErrorCategory.AUTHENTICATION)
        ? ErrorCategory.AUTHENTICATION
        : failures[0] ?? ErrorCategory.UNKNOWN;
      throw new AppError(
        `Monitoring API unreachable for site ${this.config.siteId}: ${summary.warnings.join('; ')}`,
        category,
        undefined,
        { siteId: this.config.siteId },
        false
      );
    }
    return summary;
  }

  clearCache(): void {
    this.cache.clear();
  }

  // Partial, cancelled, or still-open ranges may change on a later fetch
  private isCacheable(result: EnergyFetchResult): boolean {
    return (
      result.warnings.length === 0 &&
      !result.cancelled &&
      result.range.end < today(this.now)
    );
  }

  private async readSiteSummary(): Promise<{ summary: SiteSummary; failures: ErrorCategory[] }> {
    const warnings: string[] = [];
    const failures: ErrorCategory[] = [];

    const overview = await this.bestEffort<SiteOverview>(
      () => this.client.getOverview(),
      'site overview',
      warnings,
      failures
    );
    const envBenefits = await this.bestEffort<EnvBenefits>(
      () => this.client.getEnvBenefits(),
      'environmental benefits',
      warnings,
      failures
    );

    const co2SavedKg = envBenefits?.gasEmissionSaved?.co2 ?? 0;
    return {
      summary: {
        overview,
        envBenefits,
        co2SavedKg,
        treesPlanted: treesEquivalent(co2SavedKg),
        warnings
      },
      failures
    };
  }

  private async bestEffort<T>(
    read: () => Promise<T>,
    label: string,
    warnings: string[],
    failures: ErrorCategory[]
  ): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      const appError = this.errorHandler.logError(error, { operation: label });
      failures.push(appError.category);
      warnings.push(`Failed to fetch ${label}: ${describeError(error)}`);
      return null;
    }
  }
}
