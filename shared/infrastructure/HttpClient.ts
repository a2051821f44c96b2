import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse, isAxiosError } from 'axios';
import { FetchError, FetchHttpError, FetchNetworkError, FetchTimeoutError } from '../domain/errors.js';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds */
  timeout?: number;

  /** User agent sent with every request */
  userAgent?: string;
}

/**
 * Response from the HTTP client
 */
export interface HttpResponse {
  /** Response status code */
  statusCode: number;

  /** Response headers */
  headers: Record<string, string>;

  /** Response body as string */
  body: string;

  /** Time taken to fetch in milliseconds */
  timeTaken: number;
}

/**
 * Options for a single request
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  timeout?: number;

  /** Custom headers */
  headers?: Record<string, string>;
}

/**
 * Interface for the HTTP client
 */
export interface IHttpClient {
  /**
   * Fetch a URL with GET method.
   * Rejects with a FetchError subclass on transport failure or a non-2xx status.
   * @param url URL to fetch
   * @param options Request options
   */
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_USER_AGENT = 'DocShelf/1.0.0';

function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    flat[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}

/**
 * axios-backed HTTP client. Performs exactly one request per call; no retries.
 */
export class HttpClient implements IHttpClient {
  private axiosInstance: AxiosInstance;
  private readonly timeout: number;
  private readonly userAgent: string;

  /**
   * Create a new HTTP client
   * @param options Options for the HTTP client
   */
  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

    this.axiosInstance = axios.create({
      timeout: this.timeout,
      headers: {
        'User-Agent': this.userAgent
      },
      // Keep the raw body; HTML is parsed downstream
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true // Status is checked below
    });
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const timeout = options.timeout ?? this.timeout;
    const config: AxiosRequestConfig = {
      timeout,
      headers: {
        'User-Agent': this.userAgent,
        ...options.headers
      }
    };

    const startTime = Date.now();
    let response: AxiosResponse<string>;
    try {
      response = await this.axiosInstance.get<string>(url, config);
    } catch (error: unknown) {
      throw this.toFetchError(url, timeout, error);
    }
    const timeTaken = Date.now() - startTime;

    if (response.status < 200 || response.status >= 300) {
      throw new FetchHttpError(url, response.status, response.statusText);
    }

    return {
      statusCode: response.status,
      headers: flattenHeaders(response.headers),
      body: response.data ?? '',
      timeTaken
    };
  }

  private toFetchError(url: string, timeout: number, error: unknown): FetchError {
    if (isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new FetchTimeoutError(url, timeout);
      }
      return new FetchNetworkError(url, error, { code: error.code });
    }
    return new FetchNetworkError(url, error instanceof Error ? error : new Error(String(error)));
  }
}
