import { Logger, createFallbackLogger } from '../util/logger';
import { AppError, ErrorCategory } from '../util/error-handler';
import { BaseApiService } from './base-api-service';
import { MONITORING_PATHS } from '../constants/monitoring-api';
import { PipelineConfig } from '../config/pipeline-config';
import {
  EnvBenefits,
  IsoDate,
  RawEnergyValue,
  SiteOverview,
  TimeUnit,
  isEnergyResponse,
  isRecord
} from '../types';

/**
 * Read side of the monitoring API the pipeline depends on
 */
export interface MonitoringClient {
  getEnergyValues(timeUnit: TimeUnit, startDate: IsoDate, endDate: IsoDate): Promise<RawEnergyValue[]>;
  getOverview(): Promise<SiteOverview>;
  getEnvBenefits(): Promise<EnvBenefits>;
}

/**
 * Monitoring API Service
 * Reads energy series, site overview and environmental benefits for one site
 */
export class MonitoringApi extends BaseApiService implements MonitoringClient {
  private readonly apiKey: string;
  private readonly siteId: string;

  constructor(config: PipelineConfig, logger?: Logger) {
    super('Monitoring', logger || createFallbackLogger('Monitoring'), {
      baseURL: config.baseUrl,
      timeoutMs: config.requestTimeoutMs,
      maxRetries: config.httpRetries
    });

    this.apiKey = config.apiKey;
    this.siteId = config.siteId;

    this.logger.api('Monitoring API service initialized', {
      apiKey: this.apiKey ? '***' : 'not provided',
      siteId: this.siteId,
      baseUrl: config.baseUrl
    });
  }

  /**
   * Energy samples between two dates (inclusive). One request, no retries
   * beyond the transport setting.
   * @throws AppError when the request fails or the payload is malformed
   */
  async getEnergyValues(timeUnit: TimeUnit, startDate: IsoDate, endDate: IsoDate): Promise<RawEnergyValue[]> {
    const endpoint = MONITORING_PATHS.energy(this.siteId);
    const params = { timeUnit, startDate, endDate };
    this.logApiCall('GET', endpoint, params);

    let payload: unknown;
    try {
      payload = await this.http.get(endpoint, {
        params: { api_key: this.apiKey, ...params }
      });
    } catch (error) {
      throw this.createApiError(error, { operation: 'getEnergyValues', ...params });
    }

    if (!isEnergyResponse(payload)) {
      throw new AppError(
        `Malformed energy response for ${startDate}..${endDate}`,
        ErrorCategory.DATA,
        undefined,
        { service: this.serviceName, operation: 'getEnergyValues', ...params }
      );
    }

    const values = payload.energy?.values ?? [];
    this.logger.debug(`Received ${values.length} energy samples for ${startDate}..${endDate}`);
    return values;
  }

  /**
   * Current power, today's energy and lifetime energy
   */
  async getOverview(): Promise<SiteOverview> {
    const section = await this.getSection(MONITORING_PATHS.overview(this.siteId), 'overview', 'getOverview');
    return {
      lastUpdateTime: typeof section.lastUpdateTime === 'string' ? section.lastUpdateTime : undefined,
      lifeTimeData: {
        energy: readNumber(section.lifeTimeData, 'energy'),
        revenue: readNumber(section.lifeTimeData, 'revenue')
      },
      lastYearData: { energy: readNumber(section.lastYearData, 'energy') },
      lastMonthData: { energy: readNumber(section.lastMonthData, 'energy') },
      lastDayData: { energy: readNumber(section.lastDayData, 'energy') },
      currentPower: { power: readNumber(section.currentPower, 'power') }
    };
  }

  /**
   * CO2 and other emissions saved by the site
   */
  async getEnvBenefits(): Promise<EnvBenefits> {
    const section = await this.getSection(MONITORING_PATHS.envBenefits(this.siteId), 'envBenefits', 'getEnvBenefits');
    const gas = section.gasEmissionSaved;
    return {
      gasEmissionSaved: {
        units: isRecord(gas) && typeof gas.units === 'string' ? gas.units : undefined,
        co2: readNumber(gas, 'co2'),
        so2: readNumber(gas, 'so2'),
        nox: readNumber(gas, 'nox')
      },
      treesPlanted: readNumber(section, 'treesPlanted'),
      lightBulbs: readNumber(section, 'lightBulbs')
    };
  }

  private async getSection(endpoint: string, key: string, operation: string): Promise<Record<string, unknown>> {
    this.logApiCall('GET', endpoint);

    let payload: unknown;
    try {
      payload = await this.http.get(endpoint, { params: { api_key: this.apiKey } });
    } catch (error) {
      throw this.createApiError(error, { operation });
    }

    if (!isRecord(payload)) {
      throw new AppError(`Malformed ${key} response`, ErrorCategory.DATA, undefined, {
        service: this.serviceName,
        operation
      });
    }

    const section = payload[key];
    return isRecord(section) ? section : {};
  }
}

function readNumber(source: unknown, key: string): number | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
