import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import axiosRetry, { isNetworkError } from 'axios-retry';

import {
  BlinkNetworkException,
  BlinkProtocolException,
  BlinkTimeoutException
} from './blink-exceptions';
import { RETRY_STATUS_CODES } from './constants';
import type { BlinkLogger } from './logger';

export type HttpMethod = 'get' | 'post' | 'delete';

export interface HttpRequest {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  data?: unknown;
  responseType?: 'json' | 'arraybuffer';
  timeoutMs?: number;
}

export interface HttpResponse<T> {
  status: number;
  data: T;
}

export type SessionOptions = {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  logger: BlinkLogger;
  adapter?: AxiosAdapter;
};

const IDEMPOTENT_METHODS = ['get', 'head', 'options', 'put', 'delete'];

/**
 * Shared connection pool for every request the client makes. Transient failures are retried here,
 * so nothing above this layer needs its own retry loop.
 */
export default class BlinkSession {
  private _request: AxiosInstance;
  private _timeoutMs: number;
  private _log: BlinkLogger;

  constructor(options: SessionOptions) {
    this._timeoutMs = options.timeoutMs;
    this._log = options.logger;
    this._request = axios.create({
      timeout: options.timeoutMs,
      validateStatus: status => status >= 200 && status < 300,
      ...(options.adapter ? { adapter: options.adapter } : {})
    });

    axiosRetry(this._request, {
      retries: options.retries,
      retryDelay: retryCount => options.backoffMs * 2 ** (retryCount - 1),
      retryCondition: error => {
        const method = error.config?.method?.toLowerCase() ?? 'get';
        if (!IDEMPOTENT_METHODS.includes(method)) {
          return false;
        }

        return isNetworkError(error) || RETRY_STATUS_CODES.includes(error.response?.status ?? 0);
      },
      onRetry: (retryCount, error, config) => {
        this._log.debug(`Retry ${retryCount} for ${config.url}: ${error.message}`);
      }
    });
  }

  send = async <T>(request: HttpRequest): Promise<HttpResponse<T>> => {
    const timeoutMs = request.timeoutMs ?? this._timeoutMs;
    this._log.debug(`Making ${(request.method ?? 'get').toUpperCase()} request to ${request.url}`);

    try {
      const response = await this._request.request<T>({
        url: request.url,
        method: request.method ?? 'get',
        headers: request.headers,
        data: request.data,
        responseType: request.responseType ?? 'json',
        timeout: timeoutMs
      });

      return { status: response.status, data: response.data };
    } catch (error) {
      throw this._translate(request.url, timeoutMs, error);
    }
  };

  private _translate = (url: string, timeoutMs: number, error: unknown) => {
    if (!axios.isAxiosError(error)) {
      return error;
    }

    if (error.response) {
      return new BlinkProtocolException(url, error.response.status, error.response.data);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new BlinkTimeoutException(url, timeoutMs);
    }

    return new BlinkNetworkException(url, error.message);
  };
}
