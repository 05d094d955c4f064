import { MONITORING_API } from '../constants/monitoring-api';
import { Chunk, DateRange, IsoDate } from '../types';
import { eachDay, formatIsoDate, parseIsoDate } from '../util/date-range';
import { validateNumber } from '../util/validation';

/**
 * Split an inclusive date range into contiguous chunks of at most `maxDays`
 * days, in ascending order. A range whose end precedes its start yields no
 * chunks.
 *
 * @example
 * planChunks({ start: '2023-01-01', end: '2023-03-05' })
 * // [01-01..01-31], [02-01..03-03], [03-04..03-05]
 */
export function planChunks(range: DateRange, maxDays: number = MONITORING_API.MAX_DAYS): Chunk[] {
  validateNumber(maxDays, 'maxDays', { min: 1, integer: true });

  const end = parseIsoDate(range.end, 'end');
  const chunks: Chunk[] = [];

  let current = parseIsoDate(range.start, 'start');
  while (current <= end) {
    const candidateEnd = current.plus({ days: maxDays - 1 });
    const chunkEnd = candidateEnd < end ? candidateEnd : end;
    chunks.push({ start: formatIsoDate(current), end: formatIsoDate(chunkEnd) });
    current = chunkEnd.plus({ days: 1 });
  }

  return chunks;
}

/**
 * Single-day fallback units for a chunk
 */
export function daysInChunk(chunk: Chunk): IsoDate[] {
  return eachDay(chunk);
}
