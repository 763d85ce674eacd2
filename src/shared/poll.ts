/**
 * Polling utility for taskstack.
 *
 * Waits for an external condition (a service coming up, a process exiting)
 * with a bounded number of checks and exponential backoff between them.
 */

export interface PollOptions {
  /** Maximum number of checks. Defaults to 5. */
  attempts?: number;
  /** Delay in milliseconds before the second check. Defaults to 500. */
  intervalMs?: number;
  /** Multiplier applied to the delay after each check. Defaults to 2. */
  backoffMultiplier?: number;
  /** Maximum delay in milliseconds. Defaults to 5000. */
  maxIntervalMs?: number;
  /** Optional callback invoked after each failed check. */
  onMiss?: (attempt: number, nextDelayMs: number) => void;
}

export class PollTimeoutError extends Error {
  /** Number of checks performed. */
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = "PollTimeoutError";
    this.attempts = attempts;
  }
}

/**
 * Check a condition until it holds or the attempts run out.
 *
 * @returns true as soon as the condition holds, false when every check missed.
 */
export async function pollUntil(
  condition: () => boolean | Promise<boolean>,
  options: PollOptions = {},
): Promise<boolean> {
  const {
    attempts = 5,
    intervalMs = 500,
    backoffMultiplier = 2,
    maxIntervalMs = 5_000,
    onMiss,
  } = options;

  let delay = intervalMs;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (await condition()) return true;
    if (attempt === attempts) break;

    onMiss?.(attempt, delay);
    await sleep(delay);
    delay = Math.min(delay * backoffMultiplier, maxIntervalMs);
  }

  return false;
}

/** Like pollUntil(), but throws PollTimeoutError when the condition never holds. */
export async function waitFor(
  description: string,
  condition: () => boolean | Promise<boolean>,
  options: PollOptions = {},
): Promise<void> {
  const ok = await pollUntil(condition, options);
  if (!ok) {
    const attempts = options.attempts ?? 5;
    throw new PollTimeoutError(`Timed out waiting for ${description} after ${attempts} checks`, attempts);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
