jest.mock('node-fetch', () => ({
  __esModule: true,
  ...jest.requireActual('node-fetch'),
  default: jest.fn()
}));

import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { MonitoringApi } from '../../src/services/monitoring-api';
import { createPipelineConfig } from '../../src/config/pipeline-config';
import { AppError, ErrorCategory } from '../../src/util/error-handler';
import { createMockLogger, MockLogger } from '../mocks/logger.mock';

const mockedFetch = jest.mocked(fetch);

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' }
  });
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  const reason = await promise.then(
    () => new Error('expected rejection'),
    (error: unknown) => error
  );
  if (!(reason instanceof AppError)) {
    throw new Error(`expected AppError, got ${String(reason)}`);
  }
  return reason;
}

describe('MonitoringApi', () => {
  let logger: MockLogger;
  let api: MonitoringApi;

  beforeEach(() => {
    mockedFetch.mockReset();
    logger = createMockLogger();
    api = new MonitoringApi(createPipelineConfig({ apiKey: 'test-key', siteId: '12345' }), logger);
  });

  describe('getEnergyValues', () => {
    it('requests the energy endpoint with the date range and returns the samples', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({
        energy: {
          timeUnit: 'QUARTER_OF_AN_HOUR',
          unit: 'Wh',
          values: [
            { date: '2023-01-01 00:00:00', value: null },
            { date: '2023-01-01 00:15:00', value: 12.5 }
          ]
        }
      }));

      const values = await api.getEnergyValues('QUARTER_OF_AN_HOUR', '2023-01-01', '2023-01-31');

      expect(values).toEqual([
        { date: '2023-01-01 00:00:00', value: null },
        { date: '2023-01-01 00:15:00', value: 12.5 }
      ]);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(mockedFetch.mock.calls[0][0]).toBe(
        'https://monitoringapi.solaredge.com/site/12345/energy?api_key=test-key&timeUnit=QUARTER_OF_AN_HOUR&startDate=2023-01-01&endDate=2023-01-31'
      );
    });

    it('returns an empty list when the payload has no values', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({ energy: { timeUnit: 'DAY', unit: 'Wh' } }));

      await expect(api.getEnergyValues('DAY', '2023-01-01', '2023-01-31')).resolves.toEqual([]);
    });

    it('does not log the API key', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({ energy: { values: [] } }));

      await api.getEnergyValues('DAY', '2023-01-01', '2023-01-02');

      expect(logger.api).toHaveBeenCalledWith('GET site/12345/energy', expect.objectContaining({
        params: { timeUnit: 'DAY', startDate: '2023-01-01', endDate: '2023-01-02' }
      }));
      expect(JSON.stringify(logger.api.mock.calls)).not.toContain('test-key');
    });

    it('raises an API error on a server failure without retrying', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({ message: 'down' }, 500, 'Internal Server Error'));

      const error = await captureError(api.getEnergyValues('HOUR', '2023-01-01', '2023-01-31'));

      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(error.message).toBe('HTTP 500 Internal Server Error');
      expect(error.category).toBe(ErrorCategory.API);
      expect(error.context).toMatchObject({ service: 'Monitoring', operation: 'getEnergyValues', startDate: '2023-01-01' });
    });

    it('raises a non-recoverable authentication error on 403', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({ String: 'Invalid token' }, 403, 'Forbidden'));

      const error = await captureError(api.getEnergyValues('HOUR', '2023-01-01', '2023-01-02'));

      expect(error.category).toBe(ErrorCategory.AUTHENTICATION);
      expect(error.recoverable).toBe(false);
    });

    it('raises a data error for a malformed payload', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({ energy: { values: [{ value: 3 }] } }));

      const error = await captureError(api.getEnergyValues('HOUR', '2023-01-01', '2023-01-02'));

      expect(error.category).toBe(ErrorCategory.DATA);
      expect(error.message).toBe('Malformed energy response for 2023-01-01..2023-01-02');
    });

    it('raises a network error when the connection fails', async () => {
      const url = 'https://monitoringapi.solaredge.com/site/12345/energy?api_key=test-key&timeUnit=HOUR&startDate=2023-01-01&endDate=2023-01-02';
      mockedFetch.mockRejectedValue(new FetchError(`request to ${url} failed, reason: connect ECONNREFUSED`, 'system'));

      const error = await captureError(api.getEnergyValues('HOUR', '2023-01-01', '2023-01-02'));

      expect(error.category).toBe(ErrorCategory.NETWORK);
      expect(error.message).toBe(
        'Network error: request to https://monitoringapi.solaredge.com/site/12345/energy?api_key=***&timeUnit=HOUR&startDate=2023-01-01&endDate=2023-01-02 failed, reason: connect ECONNREFUSED'
      );
    });

    it('treats an expired request timeout as a network failure', async () => {
      const slowApi = new MonitoringApi(
        createPipelineConfig({ apiKey: 'test-key', siteId: '12345', requestTimeoutMs: 20 }),
        logger
      );
      mockedFetch.mockImplementation((_url, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const abort = new Error('The user aborted a request.');
          abort.name = 'AbortError';
          reject(abort);
        });
      }));

      const error = await captureError(slowApi.getEnergyValues('HOUR', '2023-01-01', '2023-01-02'));

      expect(error.message).toBe('Request timeout after 20ms');
      expect(error.category).toBe(ErrorCategory.NETWORK);
    });
  });

  describe('getOverview', () => {
    it('reads the overview section', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({
        overview: {
          lastUpdateTime: '2023-06-01 12:00:00',
          lifeTimeData: { energy: 1234567 },
          lastDayData: { energy: 5400 },
          currentPower: { power: 1200.5 }
        }
      }));

      const overview = await api.getOverview();

      expect(mockedFetch.mock.calls[0][0]).toBe('https://monitoringapi.solaredge.com/site/12345/overview?api_key=test-key');
      expect(overview).toEqual({
        lastUpdateTime: '2023-06-01 12:00:00',
        lifeTimeData: { energy: 1234567 },
        lastYearData: {},
        lastMonthData: {},
        lastDayData: { energy: 5400 },
        currentPower: { power: 1200.5 }
      });
    });

    it('throws when the request fails', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({}, 503, 'Service Unavailable'));

      await expect(api.getOverview()).rejects.toThrow('HTTP 503 Service Unavailable');
    });
  });

  describe('getEnvBenefits', () => {
    it('reads the saved CO2', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({
        envBenefits: {
          gasEmissionSaved: { units: 'kg', co2: 670.4, so2: 1.2, nox: 0.4 },
          treesPlanted: 19.9,
          lightBulbs: 5000
        }
      }));

      const benefits = await api.getEnvBenefits();

      expect(benefits.gasEmissionSaved).toEqual({ units: 'kg', co2: 670.4, so2: 1.2, nox: 0.4 });
      expect(benefits.treesPlanted).toBe(19.9);
    });

    it('returns empty fields when the section is missing', async () => {
      mockedFetch.mockResolvedValue(jsonResponse({}));

      const benefits = await api.getEnvBenefits();

      expect(benefits.gasEmissionSaved?.co2).toBeUndefined();
      expect(benefits.treesPlanted).toBeUndefined();
    });
  });
});
