import axios, { AxiosResponse } from 'axios';
import { IPermissionEvaluator } from '../interfaces/IPermissionEvaluator';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { PermissionDecision, PermissionOptions } from '../interfaces/types';
import {
  buildRequestHeaders,
  contentTypeOf,
  errorMessage,
  headerValue,
  isHtmlContentType,
  isNetworkFailure
} from '../utils/HttpUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

export const DEFAULT_TOS_PATHS = ['/terms', '/tos', '/terms-of-service', '/terms-and-conditions'];

const decision = (allowed: boolean, reason: string): PermissionDecision =>
  Object.freeze({ allowed, reason });

/**
 * Composite policy check run before (and independently of) scraping a page:
 *
 * 1. robots.txt
 * 2. a HEAD probe of the page: rate-limit header, status, content type
 * 3. terms-of-service discovery, informational only
 *
 * The first failing step decides. The evaluator never rejects.
 */
export class SitePermissionEvaluator implements IPermissionEvaluator {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly tosPaths: string[];
  private readonly logger = LoggingUtils.createTaggedLogger('permission');

  constructor(private readonly robotsTxtService: IRobotsTxtService, options: PermissionOptions) {
    this.headers = buildRequestHeaders(options.userAgent);
    this.timeout = options.timeout ?? 5000;
    this.tosPaths = options.tosPaths ?? DEFAULT_TOS_PATHS;
  }

  async evaluate(url: string): Promise<PermissionDecision> {
    try {
      const rootUrl = UrlUtils.getRootUrl(url);

      if (!(await this.robotsTxtService.isAllowed(url))) {
        return decision(false, 'Blocked by robots.txt');
      }

      const probe = await this.head(url);
      const denial = this.checkProbe(probe);
      if (denial) {
        this.logger.info(`Permission denied for ${url}: ${denial.reason}`);
        return denial;
      }

      const tosUrl = await this.findTermsOfService(rootUrl);
      if (tosUrl) {
        return decision(true, `Warning: Please review Terms of Service at ${tosUrl}`);
      }

      return decision(true, 'All permission checks passed');
    } catch (error) {
      const message = errorMessage(error);
      if (isNetworkFailure(error)) {
        this.logger.warn(`Network error checking ${url}: ${message}`);
        return decision(false, `Network error during permission check: ${message}`);
      }
      this.logger.error(`Permission check failed for ${url}: ${message}`);
      return decision(false, `Permission check error: ${message}`);
    }
  }

  /**
   * Inspect the HEAD probe of the page itself
   * @returns A denial, or null when the page may be scraped
   */
  private checkProbe(response: AxiosResponse): PermissionDecision | null {
    const remaining = headerValue(response.headers, 'x-ratelimit-remaining').trim();
    if (remaining !== '' && Number.isFinite(Number(remaining)) && Number(remaining) <= 0) {
      return decision(false, 'Rate limit exceeded');
    }

    if (response.status === 403) {
      return decision(false, 'Access forbidden');
    }
    if (response.status === 429) {
      return decision(false, 'Too many requests');
    }
    if (response.status !== 200) {
      return decision(false, `HTTP error: ${response.status}`);
    }

    const contentType = contentTypeOf(response);
    if (!isHtmlContentType(contentType)) {
      return decision(false, `Unsupported content type: ${contentType}`);
    }

    return null;
  }

  /**
   * Probe the candidate terms-of-service paths in order
   * @returns The first one answering 200, or null
   */
  private async findTermsOfService(rootUrl: string): Promise<string | null> {
    for (const path of this.tosPaths) {
      const tosUrl = rootUrl + path;
      try {
        const response = await this.head(tosUrl);
        if (response.status === 200) {
          this.logger.debug(`Found terms of service at ${tosUrl}`);
          return tosUrl;
        }
      } catch (error) {
        // Discovery is best-effort; an unreachable candidate is just not the page
        this.logger.debug(`Terms of service probe failed for ${tosUrl}: ${errorMessage(error)}`);
      }
    }
    return null;
  }

  /**
   * Redirects are not followed: a page or terms path is judged on its own status
   */
  private head(url: string): Promise<AxiosResponse> {
    return axios.head(url, {
      headers: this.headers,
      timeout: this.timeout,
      maxRedirects: 0,
      validateStatus: () => true,
    });
  }
}
