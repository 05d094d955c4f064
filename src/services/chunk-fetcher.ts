import { DateTime } from 'luxon';
import { Logger, createFallbackLogger } from '../util/logger';
import { AppError, ErrorCategory } from '../util/error-handler';
import { MONITORING_API } from '../constants/monitoring-api';
import { MonitoringClient } from './monitoring-api';
import { Chunk, RawEnergyValue, SampleRow, TimeUnit } from '../types';

const MAX_HOUR = 23;

/**
 * Parse the API's date-time field. The field carries site-local wall clock
 * time without a zone, so it is read in UTC to keep every hour of the day
 * representable (no DST gaps).
 */
export function parseSampleTimestamp(raw: string): DateTime {
  const trimmed = raw.trim();
  const parsed = DateTime.fromFormat(trimmed, MONITORING_API.DATE_TIME_FORMAT, { zone: 'utc' });
  if (parsed.isValid) {
    return parsed;
  }
  return DateTime.fromISO(trimmed, { zone: 'utc', setZone: true });
}

/**
 * Nearest whole hour of a fractional hour-of-day, half rounding up.
 * Values from 23.5 on stay in the 23 bucket instead of spilling into a 24th.
 */
export function roundHour(fractionalHour: number): number {
  return Math.min(MAX_HOUR, Math.round(fractionalHour));
}

/**
 * Turn one raw API sample into a dataset row
 * @throws AppError (DATA) when the timestamp cannot be parsed
 */
export function normalizeSample(raw: RawEnergyValue): SampleRow {
  const timestamp = parseSampleTimestamp(raw.date);
  if (!timestamp.isValid) {
    throw new AppError(`Unparseable sample timestamp "${raw.date}"`, ErrorCategory.DATA, undefined, {
      reason: timestamp.invalidReason
    });
  }

  const hour = timestamp.hour + timestamp.minute / 60;
  return {
    timestamp: timestamp.toFormat("yyyy-MM-dd'T'HH:mm:ss"),
    value: typeof raw.value === 'number' && Number.isFinite(raw.value) ? raw.value : 0,
    date: timestamp.toFormat('yyyy-MM-dd'),
    year: timestamp.year,
    month: timestamp.month,
    day: timestamp.day,
    hour,
    hourRounded: roundHour(hour)
  };
}

/**
 * Fetches one chunk from the monitoring API and normalizes it. Failures are
 * thrown to the caller; retry policy lives in the RetryCoordinator.
 */
export class ChunkFetcher {
  private readonly logger: Logger;

  constructor(private readonly client: MonitoringClient, logger?: Logger) {
    this.logger = logger || createFallbackLogger('ChunkFetcher');
  }

  async fetchChunk(timeUnit: TimeUnit, chunk: Chunk): Promise<SampleRow[]> {
    const values = await this.client.getEnergyValues(timeUnit, chunk.start, chunk.end);
    const rows = values.map(normalizeSample);
    this.logger.debug(`Normalized ${rows.length} samples for ${chunk.start}..${chunk.end}`);
    return rows;
  }
}
