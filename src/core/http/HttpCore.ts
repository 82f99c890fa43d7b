// src/core/http/HttpCore.ts

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpConfig, HttpRequestConfig, HttpResponse, RateLimitConfig } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import { CircuitBreaker } from './CircuitBreaker';
import {
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkTimeoutError,
  NetworkError,
  CircuitBreakerOpenError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export const DEFAULT_USER_AGENT = 'node:reddit-account-sync:v0.1.0';

// Reddit script apps are allowed roughly one request per second per account
const DEFAULT_RATE_LIMIT: RateLimitConfig = { qps: 1, concurrency: 1 };

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<string, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;
  private userAgent: string;

  constructor(
    config: HttpConfig,
    private metrics: MetricsCollector,
    private logger: Logger,
    private rateLimit: RateLimitConfig = DEFAULT_RATE_LIMIT
  ) {
    this.circuitBreaker = new CircuitBreaker(logger);
    this.retryHandler = new RetryHandler(config.retry, logger, this.circuitBreaker);
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.setupInterceptors();
  }

  /**
   * Core request: per-account throttling, retry, circuit breaker
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const { account } = config;
    const requestId = this.generateRequestId();
    const method = config.method ?? 'GET';

    this.metrics.incrementCounter('http_requests_total', {
      account,
      method,
      status: 'initiated',
    });

    this.logger.debug('HTTP request', {
      requestId,
      account,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    if (!this.circuitBreaker.canExecute(account)) {
      throw new CircuitBreakerOpenError(`Circuit breaker open for ${account}`, { account });
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.userAgent,
      'Accept-Encoding': 'gzip, deflate',
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(async () => {
            return this.axiosInstance.request<T>({
              url: config.url,
              method,
              headers,
              params: config.query,
              data: config.body,
              timeout: config.timeout,
            });
          }, account);

          this.circuitBreaker.recordSuccess(account);

          this.metrics.incrementCounter('http_requests_total', {
            account,
            method,
            status: axiosResponse.status.toString(),
          });

          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            account,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          // A client error means the remote answered; only outages trip the breaker
          if (this.isOutage(error)) {
            this.circuitBreaker.recordFailure(account);
          } else {
            this.circuitBreaker.recordSuccess(account);
          }

          const errorStatus = isAxiosError(error) ? (error.response?.status ?? 'error') : 'error';
          this.metrics.incrementCounter('http_requests_total', {
            account,
            method,
            status: errorStatus.toString(),
          });

          this.metrics.incrementCounter('http_errors', {
            account,
            status: errorStatus,
          });
          throw this.transformError(error, account);
        }
      });
    };

    return this.runThroughRateLimiter(account, execute);
  }

  private async runThroughRateLimiter<T>(account: string, task: () => Promise<T>): Promise<T> {
    const queue = this.getRateLimiter(account);

    const wrappedTask = async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { account });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { account });

    return queue.add(wrappedTask, { throwOnTimeout: true });
  }

  /**
   * Lazily create one queue per account
   */
  private getRateLimiter(account: string): PQueue {
    const existing = this.rateLimiters.get(account);
    if (existing) return existing;

    // Fractional QPS: one request per (1000 / qps) ms
    let intervalCap: number;
    let interval: number;

    if (this.rateLimit.qps >= 1) {
      intervalCap = Math.floor(this.rateLimit.qps);
      interval = 1000;
    } else {
      intervalCap = 1;
      interval = Math.floor(1000 / this.rateLimit.qps);
    }

    const queue = new PQueue({
      intervalCap,
      interval,
      concurrency: this.rateLimit.concurrency,
    });
    this.rateLimiters.set(account, queue);

    this.logger.debug('Rate limiter initialized', {
      account,
      originalQps: this.rateLimit.qps,
      intervalCap,
      interval,
      concurrency: this.rateLimit.concurrency,
    });

    return queue;
  }

  private setupInterceptors(): void {
    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (isAxiosError(error) && error.response?.status === 429) {
          const retryAfter: unknown = error.response.headers['retry-after'];
          if (retryAfter) {
            this.logger.warn('Rate limited', { retryAfter });
          }
        }
        return Promise.reject(error);
      }
    );
  }

  private isOutage(error: unknown): boolean {
    const status = isAxiosError(error) ? error.response?.status : undefined;
    return status === undefined || status === 429 || status >= 500;
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, account: string): Error {
    if (!isAxiosError(error)) {
      return new NetworkError('Network error', { account, cause: error });
    }

    if (error.response) {
      const { status, data } = error.response;

      this.logger.debug('HTTP error response', {
        account,
        status,
        statusText: error.response.statusText,
        data,
      });

      if (status === 429) {
        const retryAfter = Number(error.response.headers['retry-after']);
        return new RateLimitError('Rate limit exceeded', isNaN(retryAfter) ? undefined : retryAfter, {
          account,
        });
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, { account, response: data });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { account });
      }
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { account });
    }
    return new NetworkError('Network error', { account, cause: error.message });
  }
}
