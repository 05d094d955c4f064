import { Logger, createFallbackLogger } from '../util/logger';
import { ErrorHandler, describeError } from '../util/error-handler';
import { formatRange } from '../util/date-range';
import { daysInChunk } from './chunk-planner';
import { Chunk, DateRange, FetchWarning, SampleRow, TimeUnit, WarningScope } from '../types';

/**
 * Anything that fetches and normalizes one date range
 */
export interface RangeFetcher {
  fetchChunk(timeUnit: TimeUnit, chunk: Chunk): Promise<SampleRow[]>;
}

export interface CoordinatorOptions {
  /** Checked between chunks; an in-flight chunk always completes */
  signal?: AbortSignal;
}

export interface CoordinatorResult {
  /** Non-empty row batches in the order they were fetched */
  contributions: SampleRow[][];
  warnings: FetchWarning[];
  chunksProcessed: number;
  cancelled: boolean;
}

/**
 * Drives the chunk fetches sequentially. A failed chunk degrades to one
 * request per day; a failed day is skipped. Fetch failures never escape,
 * they come back as warnings.
 */
export class RetryCoordinator {
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;

  constructor(private readonly fetcher: RangeFetcher, logger?: Logger) {
    this.logger = logger || createFallbackLogger('RetryCoordinator');
    this.errorHandler = new ErrorHandler(this.logger);
  }

  async run(timeUnit: TimeUnit, chunks: Chunk[], options: CoordinatorOptions = {}): Promise<CoordinatorResult> {
    const contributions: SampleRow[][] = [];
    const warnings: FetchWarning[] = [];
    let chunksProcessed = 0;

    for (const chunk of chunks) {
      if (options.signal?.aborted) {
        this.logger.pipeline(`Fetch cancelled after ${chunksProcessed}/${chunks.length} chunks`);
        return { contributions, warnings, chunksProcessed, cancelled: true };
      }

      try {
        const rows = await this.fetcher.fetchChunk(timeUnit, chunk);
        if (rows.length > 0) {
          contributions.push(rows);
        }
        this.logger.pipeline(`Chunk ${formatRange(chunk)} fetched`, { rows: rows.length });
      } catch (error) {
        warnings.push(this.recordFailure('chunk', chunk, error));
        await this.fetchDayByDay(timeUnit, chunk, contributions, warnings);
      }

      chunksProcessed++;
    }

    return { contributions, warnings, chunksProcessed, cancelled: false };
  }

  private async fetchDayByDay(
    timeUnit: TimeUnit,
    chunk: Chunk,
    contributions: SampleRow[][],
    warnings: FetchWarning[]
  ): Promise<void> {
    for (const day of daysInChunk(chunk)) {
      const range = { start: day, end: day };
      try {
        const rows = await this.fetcher.fetchChunk(timeUnit, range);
        if (rows.length > 0) {
          contributions.push(rows);
        }
      } catch (error) {
        warnings.push(this.recordFailure('day', range, error));
      }
    }
  }

  private recordFailure(scope: WarningScope, range: DateRange, error: unknown): FetchWarning {
    const appError = this.errorHandler.logError(error, { scope, range: formatRange(range) });
    const cause = describeError(error);

    return {
      scope,
      range,
      cause,
      category: appError.category,
      message: scope === 'chunk'
        ? `Failed ${range.start} to ${range.end}: ${cause}. Retrying day-by-day`
        : `Skipped ${range.start}: ${cause}`
    };
  }
}
