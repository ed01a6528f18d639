import { delay } from './delay.js';
import { ConnectionError } from './errors.js';
import { logError, logInfo } from './logger/index.js';

export interface RetryConfig {
  initialDelay: number;
  maxDelay: number;
  /** Unset or 0 retries forever. */
  maxAttempts?: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  initialDelay: 1000,
  maxDelay: 30000,
};

/**
 * Calls `connectFn` until it succeeds, doubling the wait between attempts up
 * to `maxDelay`. The wait is cut short when the signal passed to `start`
 * aborts.
 */
export class ReconnectionManager {
  private attempts = 0;
  private currentDelay: number;

  constructor(
    private readonly serviceName: string,
    private readonly config: RetryConfig,
    private readonly connectFn: () => Promise<void>
  ) {
    this.currentDelay = config.initialDelay;
  }

  /**
   * Resolves `true` once connected, `false` when aborted before a connection
   * was made. Rejects with a ConnectionError when `maxAttempts` is exhausted.
   */
  public async start(signal?: AbortSignal): Promise<boolean> {
    while (!signal?.aborted) {
      try {
        await this.connectFn();
        if (this.attempts > 0) {
          logInfo(this.serviceName, `Connected after ${this.attempts + 1} attempts`);
        }
        this.reset();
        return true;
      } catch (error) {
        this.attempts++;

        if (this.config.maxAttempts && this.attempts >= this.config.maxAttempts) {
          const attempts = this.attempts;
          this.reset();
          logError(
            this.serviceName,
            `Max reconnection attempts (${attempts}) reached`,
            error
          );
          throw new ConnectionError(
            `${this.serviceName}: giving up after ${attempts} connection attempts`,
            { cause: error }
          );
        }

        logError(
          this.serviceName,
          `Connection attempt ${this.attempts} failed. Retrying in ${
            this.currentDelay / 1000
          }s`,
          error
        );

        await delay(this.currentDelay, signal);
        this.currentDelay = Math.min(this.currentDelay * 2, this.config.maxDelay);
      }
    }
    this.reset();
    return false;
  }

  private reset(): void {
    this.attempts = 0;
    this.currentDelay = this.config.initialDelay;
  }
}
