import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { FetchFailedError } from '../domain/errors.js';
import { Logger } from './logging.js';

/**
 * Options for the HTTP client
 */
export interface HttpClientOptions {
  /** Timeout in milliseconds */
  timeout?: number;

  /** Default user agent */
  userAgent?: string;

  /** Maximum redirects followed */
  maxRedirects?: number;
}

/**
 * Response from the HTTP client
 */
export interface HttpResponse {
  /** Response status code */
  statusCode: number;

  /** Response headers */
  headers: Record<string, string>;

  /** Raw response bytes, decoded by the consumer */
  body: Buffer;

  /** Time taken to fetch in milliseconds */
  timeTaken: number;
}

/**
 * Interface for the HTTP client
 */
export interface IHttpClient {
  /**
   * Fetch a URL with GET method, once.
   * Network errors, timeouts and error statuses throw FetchFailedError.
   */
  get(url: string): Promise<HttpResponse>;
}

/**
 * axios-backed HTTP client performing a single best-effort fetch
 */
export class HttpClient implements IHttpClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly options: Required<HttpClientOptions>;
  private readonly logger: Logger;

  constructor(logger: Logger, options: HttpClientOptions = {}) {
    this.logger = logger;
    this.options = {
      timeout: 30000,
      userAgent: 'SCR-KB/1.0 (Research Tool)',
      maxRedirects: 10,
      ...options
    };

    this.axiosInstance = axios.create({
      timeout: this.options.timeout,
      headers: {
        'User-Agent': this.options.userAgent
      }
    });
  }

  async get(url: string): Promise<HttpResponse> {
    const config: AxiosRequestConfig = {
      // Bytes, so the page charset is honoured when decoding
      responseType: 'arraybuffer',
      validateStatus: () => true,
      maxRedirects: this.options.maxRedirects
    };

    this.logger.info(`Fetching ${url}`, 'HttpClient');
    const startTime = Date.now();

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.axiosInstance.get<ArrayBuffer>(url, config);
    } catch (error: unknown) {
      const reason = axios.isAxiosError(error)
        ? error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
          ? `timeout after ${this.options.timeout}ms`
          : error.message
        : String(error);
      this.logger.error(`Fetch failed for ${url}: ${reason}`, 'HttpClient');
      throw new FetchFailedError(url, reason);
    }

    const timeTaken = Date.now() - startTime;

    if (response.status >= 400) {
      this.logger.error(`HTTP ${response.status} for ${url}`, 'HttpClient');
      throw new FetchFailedError(url, `HTTP error ${response.status} (${response.statusText || 'Unknown Status'})`, response.status);
    }

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(response.headers)) {
      if (value !== undefined && value !== null) {
        headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
      }
    }

    this.logger.debug(`Fetched ${url} (${response.status}) in ${timeTaken}ms`, 'HttpClient');

    return {
      statusCode: response.status,
      headers,
      body: Buffer.from(response.data),
      timeTaken
    };
  }
}
