/**
 * Interface for robots.txt handling.
 * Implementations fetch and evaluate a site's robots.txt rules for a single URL.
 */
export interface IRobotsTxtService {
  /**
   * Check if automated fetching of the URL is permitted for the configured user agent
   * @param url The URL to check
   * @returns True if the URL may be fetched
   */
  isAllowed(url: string): Promise<boolean>;
}
