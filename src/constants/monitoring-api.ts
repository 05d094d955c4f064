/**
 * Monitoring API constants
 *
 * Endpoint paths, request limits and the conversion factors used when
 * reshaping energy samples.
 */

export const MONITORING_API = {
  /**
   * Public monitoring API host
   */
  BASE_URL: 'https://monitoringapi.solaredge.com',

  /**
   * Longest date span (inclusive days) the energy endpoint accepts per request
   */
  MAX_DAYS: 31,

  /**
   * Per-request timeout (milliseconds)
   */
  REQUEST_TIMEOUT: 30_000,

  /**
   * Transport-level retries per request. The fetch pipeline does its own
   * chunk-to-day fallback, so this stays at zero by default.
   */
  HTTP_RETRIES: 0,

  /**
   * Format of the energy endpoint's date field
   */
  DATE_TIME_FORMAT: 'yyyy-MM-dd HH:mm:ss',
} as const;

export const MONITORING_PATHS = {
  energy: (siteId: string) => `site/${encodeURIComponent(siteId)}/energy`,
  overview: (siteId: string) => `site/${encodeURIComponent(siteId)}/overview`,
  envBenefits: (siteId: string) => `site/${encodeURIComponent(siteId)}/envBenefits`,
} as const;

export const ENERGY_CONVERSION = {
  /**
   * Interval length in hours per time unit, used to turn interval energy (Wh)
   * into average power (W). Coarser units have no meaningful power figure.
   */
  INTERVAL_HOURS: {
    QUARTER_OF_AN_HOUR: 0.25,
    HOUR: 1,
  },

  /**
   * kg of CO2 absorbed by one tree over its lifetime (12940 kg per 386 trees)
   */
  CO2_KG_PER_TREE: 12940 / 386,

  WH_PER_KWH: 1000,
} as const;
