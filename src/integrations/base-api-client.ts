// src/integrations/base-api-client.ts
import axios, { AxiosInstance, AxiosRequestConfig, InternalAxiosRequestConfig } from 'axios';
import { logger } from '../utils/logger';
import { CheckCancelledError, PhishyCheckError, UpstreamApiError } from '../utils/errors';

export interface APIClientOptions {
  apiKey?: string;
  timeoutMs?: number;
  axiosConfig?: AxiosRequestConfig;
}

export abstract class BaseAPIClient {
  protected client: AxiosInstance;
  protected serviceName: string;
  protected baseURL: string;
  private readonly requestStartTimes = new WeakMap<InternalAxiosRequestConfig, number>();

  constructor(serviceName: string, baseURL: string, options: APIClientOptions = {}) {
    this.serviceName = serviceName;
    this.baseURL = baseURL;

    this.client = axios.create({
      baseURL,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'User-Agent': 'Phishy-Token-Checker/1.0',
        'Content-Type': 'application/json',
        ...(options.apiKey && { 'Authorization': `Bearer ${options.apiKey}` })
      },
      ...options.axiosConfig,
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.client.interceptors.request.use((requestConfig) => {
      this.requestStartTimes.set(requestConfig, Date.now());
      return requestConfig;
    });

    this.client.interceptors.response.use(
      (response) => {
        this.recordAPICall(response.config, true);
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error) && error.config) {
          this.recordAPICall(error.config, false);
        }
        return Promise.reject(error);
      }
    );
  }

  private recordAPICall(requestConfig: InternalAxiosRequestConfig, success: boolean): void {
    const startedAt = this.requestStartTimes.get(requestConfig) ?? Date.now();
    const responseTime = Date.now() - startedAt;
    logger.debug(`API call recorded: ${this.serviceName}${requestConfig.url || ''} - ${success ? 'SUCCESS' : 'FAILED'} (${responseTime}ms)`);
  }

  /**
   * Upstream calls are expensive and slow, so failures are surfaced to the
   * caller as-is rather than retried here.
   */
  protected async makeRequest<T>(requestConfig: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.client.request<T>(requestConfig);
      return response.data;
    } catch (error) {
      const mapped = this.toCheckError(error);
      if (!(mapped instanceof CheckCancelledError)) {
        logger.error(`API call failed for ${this.serviceName}`, {
          endpoint: requestConfig.url || '/',
          error: mapped.message,
        });
      }
      throw mapped;
    }
  }

  protected toCheckError(error: unknown): PhishyCheckError {
    if (error instanceof PhishyCheckError) return error;

    if (axios.isCancel(error)) {
      return new CheckCancelledError();
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new UpstreamApiError(`${this.serviceName} request timed out`);
      }

      const status = error.response?.status;
      if (status === 401 || status === 403) {
        return new UpstreamApiError(`${this.serviceName} rejected the API key (HTTP ${status})`, status);
      }
      if (status === 429) {
        return new UpstreamApiError(`${this.serviceName} rate limit reached, try again later`, status);
      }
      if (status !== undefined) {
        return new UpstreamApiError(`${this.serviceName} request failed with HTTP ${status}`, status);
      }
      return new UpstreamApiError(`${this.serviceName} request failed: ${error.message}`);
    }

    return new UpstreamApiError(`${this.serviceName} request failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}
