import { ConsoleLogger, Logger, LogLevel, isRunningInDevMode } from './util/logger';
import { AppError, ErrorCategory, ErrorHandler, isAppError } from './util/error-handler';
import { PipelineConfig, PipelineEnv, loadPipelineConfig } from './config/pipeline-config';
import { validateIsoDate, validateOneOf } from './util/validation';
import { today } from './util/date-range';
import { EnergyHistoryDependencies, EnergyHistoryService } from './services/energy-history-service';
import {
  DailyValue,
  EnergyKpis,
  Heatmap,
  HourlyValue,
  MonthlyPower,
  availableYears,
  buildHeatmap,
  computeKpis,
  dailyPeakPower,
  dailyTotals,
  hourlyProfile,
  monthlyPower
} from './services/aggregation-service';
import { EnergyUnit, FetchWarning, IsoDate, SiteSummary, TIME_UNITS, TimeUnit } from './types';

export interface ReportRequest {
  timeUnit: TimeUnit;
  start: IsoDate;
  end: IsoDate;
  unit?: EnergyUnit;
  heatmapYear?: number;
}

export interface EnergyReport {
  request: ReportRequest;
  summary: SiteSummary;
  rows: number;
  chunks: number;
  fromCache: boolean;
  warnings: FetchWarning[];
  kpis: EnergyKpis | null;
  dailyTotals: DailyValue[];
  dailyPeakPower: DailyValue[];
  hourlyProfile: HourlyValue[];
  monthlyPower: MonthlyPower[];
  /** Years present in the dataset, for picking a heatmap year */
  years: number[];
  heatmap: Heatmap;
}

/**
 * Site energy application
 *
 * Wires configuration, logging and the fetch pipeline, and turns one request
 * into the data behind every dashboard view.
 */
export class SiteEnergyApp {
  public readonly logger: Logger;
  public readonly history: EnergyHistoryService;
  private readonly errorHandler: ErrorHandler;

  constructor(
    private readonly config: PipelineConfig,
    logger?: Logger,
    dependencies: EnergyHistoryDependencies = {}
  ) {
    this.logger = logger ?? new ConsoleLogger({
      level: config.logLevel,
      prefix: 'App',
      verboseMode: config.logLevel === LogLevel.DEBUG || isRunningInDevMode()
    });
    this.errorHandler = new ErrorHandler(this.logger);
    this.history = new EnergyHistoryService(config, this.logger, dependencies);
  }

  /**
   * @throws AppError when the monitoring API is unreachable or the request is invalid
   */
  async run(request: ReportRequest): Promise<EnergyReport> {
    const unit = request.unit ?? 'Wh';
    this.logger.marker(`Energy report ${request.timeUnit} ${request.start}..${request.end}`);

    const summary = await this.history.verifyConnectivity();
    const result = await this.history.fetchEnergy(request.timeUnit, request.start, request.end);

    if (result.dataset.length === 0) {
      this.logger.warn('No data found', { warnings: result.warnings.length });
    }

    return {
      request,
      summary,
      rows: result.dataset.length,
      chunks: result.chunks.length,
      fromCache: result.fromCache,
      warnings: result.warnings,
      kpis: computeKpis(result.dataset, request.timeUnit, unit),
      dailyTotals: dailyTotals(result.dataset, unit),
      dailyPeakPower: dailyPeakPower(result.dataset, request.timeUnit),
      hourlyProfile: hourlyProfile(result.dataset, unit),
      monthlyPower: monthlyPower(result.dataset, request.timeUnit),
      years: availableYears(result.dataset),
      heatmap: buildHeatmap(result.dataset, { year: request.heatmapYear, unit })
    };
  }

  /**
   * Log an error that stops the run and return the process exit code for it
   */
  fail(error: unknown): number {
    const appError = this.errorHandler.logError(error, { operation: 'run' });
    return appError.category === ErrorCategory.VALIDATION ? 2 : 1;
  }
}

/**
 * Parse `start [end] [timeUnit] [unit]` arguments. The range defaults to the
 * current year up to today, the time unit to quarter hours.
 */
export function parseReportArgs(args: string[], now: () => Date = () => new Date()): ReportRequest {
  const [startArg, endArg, timeUnitArg, unitArg] = args;
  const end = endArg ? validateIsoDate(endArg, 'end') : today(now);
  const start = startArg ? validateIsoDate(startArg, 'start') : `${end.slice(0, 4)}-01-01`;

  return {
    start,
    end,
    timeUnit: timeUnitArg ? validateOneOf(timeUnitArg.toUpperCase(), 'timeUnit', TIME_UNITS) : 'QUARTER_OF_AN_HOUR',
    unit: unitArg ? validateOneOf(unitArg, 'unit', ['Wh', 'kWh'] as const) : 'Wh'
  };
}

export async function main(argv: string[] = process.argv.slice(2), env: PipelineEnv = process.env): Promise<number> {
  let app: SiteEnergyApp | undefined;
  try {
    const config = loadPipelineConfig(env);
    app = new SiteEnergyApp(config);
    const report = await app.run(parseReportArgs(argv));
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (app) {
      return app.fail(error);
    }
    const fallback = new ConsoleLogger({ level: LogLevel.ERROR, prefix: 'App' });
    const appError = isAppError(error) ? error : new AppError(String(error));
    fallback.error(appError.message, appError.originalError);
    return appError.category === ErrorCategory.VALIDATION ? 2 : 1;
  }
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  }, (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
