import type { ErrorCategory } from '../util/error-handler';

/** Calendar date in yyyy-MM-dd form */
export type IsoDate = string;

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

/** Sub-range of a request, never longer than the API's maximum span */
export type Chunk = DateRange;

export const TIME_UNITS = [
  'QUARTER_OF_AN_HOUR',
  'HOUR',
  'DAY',
  'WEEK',
  'MONTH',
  'YEAR'
] as const;

export type TimeUnit = typeof TIME_UNITS[number];

export type EnergyUnit = 'Wh' | 'kWh';

// Monitoring API payload types
export interface RawEnergyValue {
  date: string;
  value?: number | null;
}

export interface EnergyResponse {
  energy?: {
    timeUnit?: string;
    unit?: string;
    measuredBy?: string;
    values?: RawEnergyValue[];
  };
}

export interface SiteOverview {
  lastUpdateTime?: string;
  lifeTimeData?: { energy?: number; revenue?: number };
  lastYearData?: { energy?: number };
  lastMonthData?: { energy?: number };
  lastDayData?: { energy?: number };
  currentPower?: { power?: number };
}

export interface EnvBenefits {
  gasEmissionSaved?: {
    units?: string;
    co2?: number;
    so2?: number;
    nox?: number;
  };
  treesPlanted?: number;
  lightBulbs?: number;
}

// Pipeline types
export interface SampleRow {
  /** Site-local wall clock time, yyyy-MM-ddTHH:mm:ss */
  timestamp: string;
  /** Energy of the interval in Wh; missing readings count as 0 */
  value: number;
  date: IsoDate;
  year: number;
  month: number;
  day: number;
  /** hour + minute / 60 */
  hour: number;
  /** 0-23 */
  hourRounded: number;
}

export type Dataset = ReadonlyArray<SampleRow>;

export type WarningScope = 'chunk' | 'day';

export interface FetchWarning {
  scope: WarningScope;
  range: DateRange;
  cause: string;
  category: ErrorCategory;
  message: string;
}

export interface EnergyFetchResult {
  timeUnit: TimeUnit;
  range: DateRange;
  dataset: Dataset;
  warnings: FetchWarning[];
  chunks: Chunk[];
  cancelled: boolean;
  fromCache: boolean;
}

export interface SiteSummary {
  overview: SiteOverview | null;
  envBenefits: EnvBenefits | null;
  co2SavedKg: number;
  treesPlanted: number;
  warnings: string[];
}

// Type guards

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRawEnergyValue(value: unknown): value is RawEnergyValue {
  return (
    isRecord(value) &&
    typeof value.date === 'string' &&
    (value.value === undefined || value.value === null || typeof value.value === 'number')
  );
}

export function isEnergyResponse(value: unknown): value is EnergyResponse {
  if (!isRecord(value)) return false;
  if (value.energy === undefined) return true;
  if (!isRecord(value.energy)) return false;
  const values = value.energy.values;
  return values === undefined || (Array.isArray(values) && values.every(isRawEnergyValue));
}
