import axios from 'axios';
import robotsParser from 'robots-parser';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { RobotsTxtOptions } from '../interfaces/types';
import { FailMode, resolveUnverifiable } from '../utils/FailPolicy';
import { buildRequestHeaders, errorMessage } from '../utils/HttpUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

/**
 * Implementation of the robots.txt service.
 *
 * robots.txt is fetched on every check; nothing is cached between calls.
 * When the file cannot be fetched (network error, timeout, any non-200 status) the
 * configured fail mode decides. It defaults to `open`: a transiently unreachable
 * robots.txt does not block scraping, and policy is ignored for that request.
 */
export class RobotsTxtService implements IRobotsTxtService {
  private readonly userAgent: string;
  private readonly timeout: number;
  private readonly failMode: FailMode;
  private readonly logger = LoggingUtils.createTaggedLogger('robots');

  constructor(options: RobotsTxtOptions) {
    this.userAgent = options.userAgent;
    this.timeout = options.timeout ?? 5000;
    this.failMode = options.failMode ?? 'open';
  }

  async isAllowed(url: string): Promise<boolean> {
    let robotsUrl: string;
    try {
      robotsUrl = UrlUtils.getRobotsUrl(url);
    } catch (error) {
      return resolveUnverifiable(this.failMode, `Cannot derive robots.txt location for ${url}: ${errorMessage(error)}`, this.logger);
    }

    let content: string;
    try {
      this.logger.debug(`Loading robots.txt from ${robotsUrl}`);

      const response = await axios.get<string>(robotsUrl, {
        headers: buildRequestHeaders(this.userAgent),
        timeout: this.timeout,
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        return resolveUnverifiable(this.failMode, `No robots.txt at ${robotsUrl} (HTTP ${response.status})`, this.logger);
      }
      content = typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      return resolveUnverifiable(this.failMode, `Error loading robots.txt from ${robotsUrl}: ${errorMessage(error)}`, this.logger);
    }

    const robots = robotsParser(robotsUrl, content);
    const allowed = robots.isAllowed(url, this.userAgent);

    // undefined means the URL is outside the robots file's origin; there is no rule against it
    const permitted = allowed !== false;
    this.logger.debug(`robots.txt ${permitted ? 'allows' : 'disallows'} ${url}`);
    return permitted;
  }
}
