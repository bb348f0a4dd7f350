import { URL } from 'url';

/**
 * Utilities for handling URLs in the scraper service
 */
export class UrlUtils {
  /**
   * Extracts the network host (hostname plus any explicit port) from a URL
   * @returns The host string or null if the URL is invalid
   */
  static extractHost(url: string): string | null {
    try {
      return new URL(url).host || null;
    } catch (error) {
      return null;
    }
  }

  /**
   * True for absolute http(s) URLs with a host
   */
  static isHttpUrl(url: string): boolean {
    try {
      const parsedUrl = new URL(url);
      return (parsedUrl.protocol === 'http:' || parsedUrl.protocol === 'https:') && parsedUrl.host !== '';
    } catch (error) {
      return false;
    }
  }

  /**
   * Gets the root URL (scheme + host) from a URL.
   * Unlike the other helpers this throws on invalid input: callers need the failure.
   */
  static getRootUrl(url: string): string {
    const parsedUrl = new URL(url);
    return `${parsedUrl.protocol}//${parsedUrl.host}`;
  }

  /**
   * `{scheme}://{host}/robots.txt` for the site serving `url`
   */
  static getRobotsUrl(url: string): string {
    return `${this.getRootUrl(url)}/robots.txt`;
  }
}
