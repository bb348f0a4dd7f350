import axios, { AxiosResponse } from 'axios';
import { IContentExtractor } from '../interfaces/IContentExtractor';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { ContentStrategy, ExtractedDocument, ExtractionOptions } from '../interfaces/types';
import { ExtractionEmptyError, NetworkError, PolicyDeniedError } from '../../../middleware/errorHandler';
import { buildRequestHeaders, contentTypeOf, errorMessage, isHtmlContentType, isNetworkFailure } from '../utils/HttpUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { collapseWhitespace, DEFAULT_STRATEGIES, loadDocument, runContentCascade } from './ContentCascade';

/**
 * Content extractor for static HTML pages using Cheerio.
 *
 * Checks robots.txt itself rather than relying on a prior permission evaluation, so
 * every fetch is gated even when the caller skipped the full policy check.
 */
export class CheerioExtractor implements IContentExtractor {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly maxTextLength: number;
  private readonly minTextLength: number;
  private readonly strategies: ContentStrategy[];
  private readonly logger = LoggingUtils.createTaggedLogger('extractor');

  constructor(private readonly robotsTxtService: IRobotsTxtService, options: ExtractionOptions) {
    this.headers = buildRequestHeaders(options.userAgent);
    this.timeout = options.timeout ?? 15000;
    this.maxTextLength = options.maxTextLength ?? 12000;
    this.minTextLength = options.minTextLength ?? 100;
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
  }

  async extract(url: string): Promise<ExtractedDocument> {
    const startTime = Date.now();
    this.logger.debug(`Starting extraction for ${url}`);

    if (!(await this.robotsTxtService.isAllowed(url))) {
      throw new PolicyDeniedError('Scraping disallowed by robots.txt');
    }

    const response = await this.fetch(url);

    const contentType = contentTypeOf(response);
    if (!isHtmlContentType(contentType)) {
      throw new PolicyDeniedError(`Unsupported content type: ${contentType}`);
    }

    const html = typeof response.data === 'string' ? response.data : String(response.data);
    const document = this.extractFromHtml(url, html);

    this.logger.debug(
      `Extraction completed for ${url} in ${Date.now() - startTime}ms ` +
      `(${document.text.length} chars via ${document.strategy}${document.truncated ? ', truncated' : ''})`
    );
    return document;
  }

  /**
   * Reduce an already fetched HTML document to bounded plain text
   * @throws ExtractionEmptyError when the page holds too little text
   */
  extractFromHtml(url: string, html: string): ExtractedDocument {
    const $ = loadDocument(html);
    const title = collapseWhitespace($('title').first().text()) || null;

    const result = runContentCascade($, this.strategies);
    // Lengths are counted in code points so an emoji is never split
    const characters = result ? Array.from(result.text) : [];
    if (!result || characters.length <= this.minTextLength) {
      throw new ExtractionEmptyError();
    }

    const truncated = characters.length > this.maxTextLength;
    return {
      url,
      title,
      text: truncated ? characters.slice(0, this.maxTextLength).join('') : result.text,
      truncated,
      strategy: result.strategy,
    };
  }

  private async fetch(url: string): Promise<AxiosResponse<string>> {
    try {
      return await axios.get<string>(url, {
        headers: this.headers,
        timeout: this.timeout,
        responseType: 'text',
        maxRedirects: 5,
      });
    } catch (error) {
      if (isNetworkFailure(error)) {
        this.logger.error(`Error fetching ${url}: ${errorMessage(error)}`);
        throw new NetworkError(`Network error: ${errorMessage(error)}`);
      }
      throw error;
    }
  }
}
