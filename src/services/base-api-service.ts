import { Logger } from '../util/logger';
import { ErrorHandler, AppError } from '../util/error-handler';
import { HttpClient, HttpClientOptions, createHttpClient } from '../util/http';

/**
 * Base API Service
 * Provides common functionality for API services
 */
export abstract class BaseApiService {
  protected logger: Logger;
  protected errorHandler: ErrorHandler;
  protected http: HttpClient;

  /**
   * @param serviceName Name of the service for logging
   * @param logger Logger instance
   * @param httpOptions Options for the underlying HTTP client
   */
  constructor(
    protected readonly serviceName: string,
    logger: Logger,
    httpOptions: Omit<HttpClientOptions, 'logger'>
  ) {
    this.logger = logger;
    this.errorHandler = new ErrorHandler(this.logger);
    this.http = createHttpClient({ ...httpOptions, logger: this.logger });
  }

  /**
   * Log API call details
   * @param method HTTP method
   * @param endpoint API endpoint
   * @param params Optional parameters (never include credentials)
   */
  protected logApiCall(method: string, endpoint: string, params?: Record<string, unknown>): void {
    this.logger.api(`${method} ${endpoint}`, {
      method,
      endpoint,
      params: params || null,
      timestamp: new Date().toISOString(),
      service: this.serviceName
    });
  }

  /**
   * Create a standardized API error
   * @param error Original error
   * @param context Additional context information
   */
  protected createApiError(error: unknown, context?: Record<string, unknown>): AppError {
    return this.errorHandler.createAppError(error, {
      service: this.serviceName,
      ...context
    });
  }
}
