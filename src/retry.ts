import * as log from "./log.js";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export class NonRetryableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NonRetryableError";
  }
}

/** A hosting API answered with a non-2xx status. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 4,
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusOf(err: unknown): number | undefined {
  if (err instanceof HttpError) return err.status;
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/** Client errors other than rate limiting will fail the same way again. */
export function isPermanentFailure(err: unknown): boolean {
  const status = statusOf(err);
  return status !== undefined && status >= 400 && status < 500 && status !== 429;
}

export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs } = { ...DEFAULTS, ...opts };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof NonRetryableError) {
        throw err;
      }
      if (isPermanentFailure(err)) {
        throw new NonRetryableError(`${label}: ${log.errorMessage(err)}`, { cause: err });
      }

      const msg = log.errorMessage(err);
      const isLastAttempt = attempt === maxAttempts;

      if (isLastAttempt) {
        log.error(`${label} failed after ${maxAttempts} attempts: ${msg}`);
        throw err;
      }

      const delayMs = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      log.warn(
        `${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${(delayMs / 1000).toFixed(1)}s…: ${msg}`,
      );
      await sleep(delayMs);
    }
  }

  throw new Error("unreachable");
}
