/**
 * Aggregated views over a normalized dataset
 *
 * Values in the dataset are interval energies in Wh. Views that report power
 * divide by the interval length, which depends on the time unit of the fetch.
 */

import { ENERGY_CONVERSION } from '../constants/monitoring-api';
import { Dataset, EnergyUnit, IsoDate, SampleRow, TimeUnit } from '../types';

export interface EnergyKpis {
  totalEnergy: number;
  unit: EnergyUnit;
  /** null for time units without a fixed interval length */
  maxPowerW: number | null;
  peakTimestamp: string;
}

export interface DailyValue {
  date: IsoDate;
  value: number;
}

export interface HourlyValue {
  hour: number;
  value: number;
}

export interface MonthlyPower {
  year: number;
  month: number;
  label: string;
  avgW: number;
  peakW: number;
}

export interface Heatmap {
  /** Hours with at least one non-zero cell, ascending */
  hours: number[];
  dates: IsoDate[];
  /** values[hourIndex][dateIndex], mean energy in the chosen unit */
  values: number[][];
}

export function unitFactor(unit: EnergyUnit): number {
  return unit === 'Wh' ? 1 : ENERGY_CONVERSION.WH_PER_KWH;
}

/**
 * Interval length in hours for power conversion, or null when the time unit
 * has no fixed interval (days and coarser)
 */
export function intervalHours(timeUnit: TimeUnit): number | null {
  switch (timeUnit) {
    case 'QUARTER_OF_AN_HOUR':
      return ENERGY_CONVERSION.INTERVAL_HOURS.QUARTER_OF_AN_HOUR;
    case 'HOUR':
      return ENERGY_CONVERSION.INTERVAL_HOURS.HOUR;
    default:
      return null;
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

function groupBy<K>(dataset: Dataset, keyOf: (row: SampleRow) => K): Map<K, SampleRow[]> {
  const groups = new Map<K, SampleRow[]>();
  for (const row of dataset) {
    const key = keyOf(row);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

function sum(rows: ReadonlyArray<SampleRow>): number {
  return rows.reduce((total, row) => total + row.value, 0);
}

function max(rows: ReadonlyArray<SampleRow>): number {
  return rows.reduce((best, row) => (row.value > best ? row.value : best), Number.NEGATIVE_INFINITY);
}

function mean(rows: ReadonlyArray<SampleRow>): number {
  return rows.length > 0 ? sum(rows) / rows.length : 0;
}

function toPower(energyWh: number, hours: number | null): number | null {
  return hours === null ? null : Math.round(energyWh / hours);
}

/**
 * Total energy, highest interval power and when it happened.
 * Ties resolve to the earliest timestamp.
 */
export function computeKpis(dataset: Dataset, timeUnit: TimeUnit, unit: EnergyUnit = 'Wh'): EnergyKpis | null {
  if (dataset.length === 0) {
    return null;
  }

  let peak = dataset[0];
  for (const row of dataset) {
    if (row.value > peak.value) {
      peak = row;
    }
  }

  return {
    totalEnergy: roundTo(sum(dataset) / unitFactor(unit), 2),
    unit,
    maxPowerW: toPower(peak.value, intervalHours(timeUnit)),
    peakTimestamp: peak.timestamp
  };
}

export function dailyTotals(dataset: Dataset, unit: EnergyUnit = 'Wh'): DailyValue[] {
  return [...groupBy(dataset, row => row.date)]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, rows]) => ({ date, value: roundTo(sum(rows) / unitFactor(unit), 2) }));
}

/**
 * Highest interval power of each day in W. Empty for time units without a
 * fixed interval.
 */
export function dailyPeakPower(dataset: Dataset, timeUnit: TimeUnit): DailyValue[] {
  const hours = intervalHours(timeUnit);
  if (hours === null) {
    return [];
  }
  return [...groupBy(dataset, row => row.date)]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, rows]) => ({ date, value: Math.round(max(rows) / hours) }));
}

/**
 * Mean interval energy per rounded hour of day
 */
export function hourlyProfile(dataset: Dataset, unit: EnergyUnit = 'Wh'): HourlyValue[] {
  return [...groupBy(dataset, row => row.hourRounded)]
    .sort(([a], [b]) => a - b)
    .map(([hour, rows]) => ({ hour, value: roundTo(mean(rows) / unitFactor(unit), 2) }));
}

/**
 * Average and peak interval power per calendar month
 */
export function monthlyPower(dataset: Dataset, timeUnit: TimeUnit): MonthlyPower[] {
  const hours = intervalHours(timeUnit);
  if (hours === null) {
    return [];
  }

  return [...groupBy(dataset, row => `${row.year}-${String(row.month).padStart(2, '0')}`)]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([label, rows]) => ({
      year: rows[0].year,
      month: rows[0].month,
      label,
      avgW: Math.round(mean(rows) / hours),
      peakW: Math.round(max(rows) / hours)
    }));
}

export function availableYears(dataset: Dataset): number[] {
  return [...new Set(dataset.map(row => row.year))].sort((a, b) => a - b);
}

/**
 * Hour-by-date matrix of mean energy. Missing cells are 0 and hours that are
 * 0 on every date are dropped.
 */
export function buildHeatmap(dataset: Dataset, options: { year?: number; unit?: EnergyUnit } = {}): Heatmap {
  const factor = unitFactor(options.unit ?? 'Wh');
  const rows = options.year === undefined ? dataset : dataset.filter(row => row.year === options.year);

  const dates = [...new Set(rows.map(row => row.date))].sort();
  const cells = groupBy(rows, row => `${row.hourRounded}|${row.date}`);

  const hours: number[] = [];
  const values: number[][] = [];
  for (let hour = 0; hour < 24; hour++) {
    const line = dates.map(date => {
      const bucket = cells.get(`${hour}|${date}`);
      return bucket ? mean(bucket) / factor : 0;
    });
    if (line.some(value => value !== 0)) {
      hours.push(hour);
      values.push(line.map(value => roundTo(value, 2)));
    }
  }

  return { hours, dates, values };
}
