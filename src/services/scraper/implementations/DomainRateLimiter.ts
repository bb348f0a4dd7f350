import { IRateLimiter, RateLimiterStats, RateWindow } from '../interfaces/IRateLimiter';
import { RateLimiterOptions } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

/**
 * Fixed-window request counter per host.
 *
 * A window opens on the first request for a host and is replaced by a fresh one on the
 * first request arriving more than `windowMs` after it opened. The window resets rather
 * than slides, so up to twice `maxRequests` may pass in a short burst straddling a reset.
 *
 * Windows are never evicted; the process is expected to see a bounded set of hosts.
 * `check` is synchronous, so on Node's single JavaScript thread the read-then-increment
 * cannot interleave between concurrent requests.
 */
export class DomainRateLimiter implements IRateLimiter {
  private windows: Map<string, RateWindow> = new Map();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly logger = LoggingUtils.createTaggedLogger('rate-limiter');

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 60;
    this.windowMs = options.windowMs ?? 60000;
    this.now = options.now ?? Date.now;
    this.logger.info(`Initialized with ${this.maxRequests} requests per ${this.windowMs}ms per domain`);
  }

  check(url: string): boolean {
    const domain = UrlUtils.extractHost(url) ?? url;
    const now = this.now();

    let rateWindow = this.windows.get(domain);
    if (!rateWindow || now - rateWindow.windowStart > this.windowMs) {
      rateWindow = { count: 0, windowStart: now };
      this.windows.set(domain, rateWindow);
    }

    rateWindow.count += 1;
    const allowed = rateWindow.count <= this.maxRequests;

    if (!allowed) {
      this.logger.warn(`Rate limit hit for ${domain}: ${rateWindow.count} requests in current window`);
    } else {
      this.logger.debug(`Request ${rateWindow.count}/${this.maxRequests} for ${domain}`);
    }

    return allowed;
  }

  /**
   * Clear all rate limiting information
   */
  reset(): void {
    this.windows.clear();
    this.logger.info('Rate limiter reset');
  }

  getStats(): RateLimiterStats {
    const windows: Record<string, RateWindow> = {};
    this.windows.forEach((rateWindow, domain) => {
      windows[domain] = { ...rateWindow };
    });

    return {
      domains: this.windows.size,
      windows
    };
  }
}
