import { ExtractedDocument } from './types';

/**
 * Interface for turning a page URL into bounded, cleaned plain text.
 */
export interface IContentExtractor {
  /**
   * Fetch the page and reduce it to plain text
   * @throws PolicyDeniedError, NetworkError or ExtractionEmptyError
   */
  extract(url: string): Promise<ExtractedDocument>;
}
