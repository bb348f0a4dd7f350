/**
 * Interface defining the contract for per-domain request limiters
 */
export interface IRateLimiter {
  /**
   * Records one request against the URL's host
   * @param url The URL (or bare host) being requested
   * @returns True if the request is within the host's allowance
   */
  check(url: string): boolean;

  /**
   * Resets all rate limiting information
   */
  reset(): void;

  /**
   * Gets statistics about the current windows
   */
  getStats(): RateLimiterStats;
}

/**
 * Per-host window state
 */
export interface RateWindow {
  count: number;
  windowStart: number;
}

export interface RateLimiterStats {
  domains: number;
  windows: Record<string, RateWindow>;
}
