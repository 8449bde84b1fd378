import axios, { type AxiosInstance } from 'axios';
import { USER_AGENTS } from '../config/sources';
import { errorMessage } from './errors';
import { logger as rootLogger, type Logger } from './logger';

const MIN_DELAY_MS = 1500;
const MAX_DELAY_MS = 3000;
const RATE_LIMIT_UNIT_MS = 10_000;
const FORBIDDEN_COOLDOWN_MS = 5000;
const ERROR_COOLDOWN_MS = 3000;
const MAX_ATTEMPTS = 3;
const REQUEST_TIMEOUT_MS = 15_000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface HttpFetcherOptions {
  client?: AxiosInstance;
  userAgents?: readonly string[];
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
}

/**
 * Polite JSON fetcher for the public listing endpoints.
 *
 * Owns its identity rotation and backoff state, so create one per run rather
 * than sharing it across the process. Every request is preceded by a random
 * 1.5-3s pause; rate limiting, blocking and transport failures are retried up
 * to three times, after which `fetchPage` resolves to `null`.
 */
export class HttpFetcher {
  private readonly client: AxiosInstance;
  private readonly userAgents: readonly string[];
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly log: Logger;
  private userAgentIndex = 0;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgents = options.userAgents && options.userAgents.length > 0 ? options.userAgents : USER_AGENTS;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.log = (options.logger ?? rootLogger).child({ component: 'fetcher' });
    this.client =
      options.client ??
      axios.create({
        timeout: REQUEST_TIMEOUT_MS,
      });
  }

  get userAgent(): string {
    return this.userAgents[this.userAgentIndex];
  }

  /**
   * Move to the next identity in the list
   */
  rotateIdentity(): void {
    this.userAgentIndex = (this.userAgentIndex + 1) % this.userAgents.length;
  }

  async fetchPage(url: string): Promise<unknown | null> {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      await this.sleep(MIN_DELAY_MS + this.random() * (MAX_DELAY_MS - MIN_DELAY_MS));

      try {
        const response = await this.client.get<unknown>(url, {
          timeout: REQUEST_TIMEOUT_MS,
          validateStatus: () => true,
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'application/json,text/html;q=0.9,*/*;q=0.8',
            'Accept-Language': 'en-US,en;q=0.5',
          },
        });

        if (response.status === 200) {
          return response.data;
        }

        if (response.status === 429) {
          const waitTime = (attempt + 1) * RATE_LIMIT_UNIT_MS;
          this.log.warn({ url, attempt: attempt + 1 }, `⚠️  429 Too Many Requests. Waiting ${waitTime / 1000}s...`);
          await this.sleep(waitTime);
          this.rotateIdentity();
        } else if (response.status === 403) {
          this.log.warn({ url, attempt: attempt + 1 }, '🚫 Access forbidden, rotating user agent...');
          this.rotateIdentity();
          await this.sleep(FORBIDDEN_COOLDOWN_MS);
        } else {
          this.log.warn({ url, attempt: attempt + 1 }, `HTTP ${response.status}, retrying...`);
          await this.sleep(ERROR_COOLDOWN_MS);
        }
      } catch (error) {
        this.log.warn({ url, attempt: attempt + 1, error: errorMessage(error) }, 'Request error, retrying...');
        await this.sleep(ERROR_COOLDOWN_MS);
      }
    }

    this.log.error({ url }, `❌ Giving up after ${MAX_ATTEMPTS} attempts`);
    return null;
  }
}
