import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { Pool, Dispatcher, FormData } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';
import { Readable } from 'stream';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer | Readable | FormData;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the payload is JSON, raw text otherwise. */
  body: unknown;
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly pools: Map<string, Pool> = new Map();
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 0;
  private readonly defaultRetryDelay = 1000;
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(HttpClientService.name);
  }

  private getPool(baseUrl: string): Pool {
    let pool = this.pools.get(baseUrl);
    if (!pool) {
      pool = new Pool(baseUrl, {
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(baseUrl, pool);
    }
    return pool;
  }

  /**
   * Retries (off unless `maxRetries` is set) only cover transport failures.
   * Non-2xx responses are returned to the caller as they are.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const baseUrl = `${parsedUrl.protocol}//${parsedUrl.host}`;
    const path = parsedUrl.pathname + parsedUrl.search;

    const pool = this.getPool(baseUrl);
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelay ?? this.defaultRetryDelay;

    let lastError: unknown = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await pool.request({
          path,
          method: options.method || 'GET',
          headers: options.headers,
          body: options.body,
          signal: options.signal,
          headersTimeout: options.timeout ?? this.defaultTimeout,
          bodyTimeout: options.timeout ?? this.defaultTimeout,
        });

        const bodyText = await response.body.text();

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: parseBody(bodyText),
        };
      } catch (error) {
        lastError = error;
        if (options.signal?.aborted) {
          throw error;
        }

        if (attempt < maxRetries) {
          this.logger.warn(
            { url: baseUrl + parsedUrl.pathname, attempt, error: errorMessage(error) },
            'HTTP request failed, retrying',
          );
          await sleep(retryDelay * Math.pow(2, attempt), undefined, {
            signal: options.signal,
          });
        }
      }
    }

    this.logger.debug(
      { url: baseUrl + parsedUrl.pathname, maxRetries, error: errorMessage(lastError) },
      'HTTP request failed',
    );
    throw lastError;
  }

  async post(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        ...options?.headers,
      },
    });
  }

  /**
   * Multipart POST. undici sets the boundary header from the form itself.
   */
  async postForm(
    url: string,
    form: FormData,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'POST', body: form });
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return text;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
