import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { ZodType } from 'zod';
import { ProviderError } from '../../../utils/errors';
import { minutesToMs } from '../../../utils/time';
import { SourceHealth } from '../types';

export interface WalletSourceConfig {
  baseUrl: string;
  timeout: number;
  params?: Record<string, string>;
  adapter?: AxiosAdapter;
}

type QueryParams = Record<string, string | number>;

export abstract class BaseWalletSource {
  protected lastError: Error | null = null;
  protected lastSuccessTime: Date | null = null;
  protected consecutiveFailures: number = 0;
  protected readonly http: AxiosInstance;

  constructor(
    public readonly name: string,
    protected readonly config: WalletSourceConfig
  ) {
    // Every status is inspected by hand so 429 can be told apart from other failures
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: { Accept: 'application/json' },
      validateStatus: () => true,
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  /**
   * Issues exactly one GET and validates the body against `schema`.
   * Failures surface as {@link ProviderError}; there is no retry.
   */
  protected async get<T>(path: string, schema: ZodType<T>, params: QueryParams = {}): Promise<T> {
    try {
      const data = await this.request(path, schema, params);
      this.lastError = null;
      this.lastSuccessTime = new Date();
      this.consecutiveFailures = 0;
      return data;
    } catch (error) {
      if (!(error instanceof ProviderError) && !axios.isAxiosError(error)) {
        throw error;
      }
      const failure = error instanceof ProviderError ? error : this.fromAxiosError(error);
      this.lastError = failure;
      this.consecutiveFailures++;
      throw failure;
    }
  }

  isHealthy(): boolean {
    const fiveMinutesAgo = new Date(Date.now() - minutesToMs(5));
    return (
      this.consecutiveFailures < 5 &&
      this.lastSuccessTime !== null &&
      this.lastSuccessTime > fiveMinutesAgo
    );
  }

  getHealth(): SourceHealth {
    return {
      name: this.name,
      healthy: this.isHealthy(),
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError?.message ?? null,
    };
  }

  private async request<T>(path: string, schema: ZodType<T>, params: QueryParams): Promise<T> {
    const response = await this.http.get<unknown>(path, {
      params: { ...this.config.params, ...params },
    });

    if (response.status === 429) {
      throw new ProviderError(this.name, 'rate-limited', `${this.name} rate limit exceeded`, 429);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new ProviderError(
        this.name,
        'http',
        `${this.name} API error: ${response.status}`,
        response.status
      );
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0]?.message ?? 'invalid payload';
      throw new ProviderError(this.name, 'malformed', `Unexpected ${this.name} payload: ${issue}`);
    }
    return parsed.data;
  }

  private fromAxiosError(error: Error & { code?: string }): ProviderError {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new ProviderError(
      this.name,
      timedOut ? 'timeout' : 'network',
      `${this.name} request failed: ${error.message}`
    );
  }
}
