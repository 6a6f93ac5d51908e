import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { gunzipSync } from 'zlib';
import { logger } from '../../config/logger.config';
import { ExternalApiException } from '../../utils/exceptions';
import { ProviderConfig } from '../shared/stats-provider.types';

const API_NAME = 'nflverse';

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

/**
 * Determines if an Axios error represents a transient failure that should be retried.
 * Returns true for 5xx server errors, timeouts, and network-level errors.
 * Returns false for 4xx client errors (permanent failures).
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;

  // Network-level errors (no response received)
  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;

  // Axios timeout
  if (error.message.includes('timeout')) return true;

  // 5xx server errors are transient
  const status = error.response?.status;
  if (status !== undefined && status >= 500) return true;

  return false;
}

/** Anything that can hand back the text of a CSV release file */
export interface CsvSource {
  fetchCsv(path: string): Promise<string>;
}

export interface NflverseClientOptions extends ProviderConfig {
  maxRetries?: number;
  baseDelayMs?: number;
  /** Request adapter override (tests) */
  adapter?: AxiosAdapter;
}

/**
 * Downloads CSV release files from the nflverse data repository.
 * Files ending in .gz are decompressed before they are returned.
 */
export class NflverseApiClient implements CsvSource {
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: NflverseClientOptions) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      responseType: 'arraybuffer',
      maxRedirects: 5,
      adapter: options.adapter,
    });
  }

  /**
   * Execute a request with retry logic for transient failures.
   * Retries on 5xx errors, timeouts, and network errors with exponential backoff (1s, 2s, 4s).
   * Does NOT retry on 4xx client errors (permanent failures).
   */
  private async withRetry<T>(fn: () => Promise<T>, context: string): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.maxRetries || !isTransientError(error)) {
          throw error;
        }
        const delay = this.baseDelayMs * Math.pow(2, attempt);
        logger.warn('nflverse transient error, retrying', {
          context,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delay,
          errorMessage: error instanceof Error ? error.message : String(error),
          errorCode: axios.isAxiosError(error) ? error.code : undefined,
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
        });
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  /**
   * Fetch a release file as text
   * @param path - Path under the base URL (e.g., "pbp/play_by_play_2025.csv.gz")
   * @throws ExternalApiException once retries are exhausted or on a permanent failure
   */
  async fetchCsv(path: string): Promise<string> {
    logger.debug(`Downloading ${path}`);
    try {
      const body = await this.withRetry(async () => {
        const response = await this.client.get<ArrayBuffer>(`/${path}`);
        return Buffer.from(response.data);
      }, path);
      const text = path.endsWith('.gz') ? gunzipSync(body).toString('utf-8') : body.toString('utf-8');
      logger.debug(`Downloaded ${path} (${body.length} bytes)`);
      return text;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED') {
          throw ExternalApiException.timeout(API_NAME, path);
        }
        throw ExternalApiException.fromError(API_NAME, path, error, error.response?.status);
      }
      throw ExternalApiException.fromError(API_NAME, path, error);
    }
  }
}
