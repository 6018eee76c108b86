// ABOUTME: fetch with a deadline for external API calls.
// ABOUTME: A request that outlives its timeout is aborted and reported as TimeoutError.

/** Deadline for metadata lookups when the caller sets none */
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface FetchWithTimeoutOptions extends RequestInit {
  timeoutMs?: number;
}

export class TimeoutError extends Error {
  constructor(
    public url: string,
    public timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * @example
 * const response = await fetchWithTimeout(url, { timeoutMs: 5000, headers: { Accept: 'application/json' } });
 */
export async function fetchWithTimeout(
  url: string | URL,
  { timeoutMs = DEFAULT_TIMEOUT_MS, ...init }: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const href = url.toString();
  const signal = AbortSignal.timeout(timeoutMs);

  try {
    return await fetch(href, { ...init, signal });
  } catch (error) {
    // Any failure after the deadline fired is the deadline's doing
    if (signal.aborted) {
      throw new TimeoutError(href, timeoutMs);
    }
    throw error;
  }
}
