import type { Logger } from "../base/logger.service";
import { ProviderError } from "../errors";
import type { TRetryConfig } from "./types";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` up to `retries + 1` times with a linearly growing pause. Provider
 * errors raised by `fn` itself are final.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  config: TRetryConfig,
  logger: Logger,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= config.retries; attempt++) {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof ProviderError) {
        throw e;
      }
      lastError = e;
      if (attempt < config.retries) {
        logger.warn(
          `${operation} failed, retry ${attempt + 1}/${config.retries}`,
          e,
        );
        await sleep(config.retryDelayMs * (attempt + 1));
      }
    }
  }
  throw new ProviderError(
    "RequestFailed",
    `${operation} failed after ${config.retries + 1} attempts`,
    { cause: lastError },
  );
}
