import axios, { AxiosResponse } from 'axios';

/**
 * Headers sent with every outbound request
 */
export function buildRequestHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': 'text/html,application/xhtml+xml',
    'Accept-Language': 'en-US,en;q=0.9',
  };
}

/**
 * Read a response header as a plain string, '' when absent
 */
export function headerValue(headers: AxiosResponse['headers'], name: string): string {
  const value: unknown = headers[name.toLowerCase()];
  if (value === undefined || value === null) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return String(value);
}

/**
 * The lower-cased Content-Type of a response
 */
export function contentTypeOf(response: AxiosResponse): string {
  return headerValue(response.headers, 'content-type').toLowerCase();
}

export function isHtmlContentType(contentType: string): boolean {
  return contentType.includes('text/html') || contentType.includes('application/xhtml+xml');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for failures of the HTTP exchange itself: refused connections, timeouts, non-2xx statuses
 */
export function isNetworkFailure(error: unknown): boolean {
  return axios.isAxiosError(error);
}
