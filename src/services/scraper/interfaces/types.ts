/**
 * Common types for the scraper service
 */
import { CheerioAPI } from 'cheerio';
import { FailMode } from '../utils/FailPolicy';

/**
 * Result of a site permission check
 */
export interface PermissionDecision {
  readonly allowed: boolean;
  readonly reason: string;
}

/**
 * Names of the built-in content selection stages, most to least specific
 */
export type ContentStrategyName = 'containers' | 'sections' | 'paragraphs' | 'blocks' | 'document';

/**
 * One stage of the content cascade: returns the text segments it selected, or null when it found nothing
 */
export interface ContentStrategy {
  name: string;
  select($: CheerioAPI): string[] | null;
}

/**
 * Plain text extracted from a page
 */
export interface ExtractedDocument {
  url: string;
  title: string | null;
  text: string;
  truncated: boolean;
  strategy: string;
}

/**
 * Options shared by the components that talk to a site
 */
export interface SiteRequestOptions {
  userAgent: string;
  timeout?: number;
}

export interface RobotsTxtOptions extends SiteRequestOptions {
  failMode?: FailMode;
}

export interface ExtractionOptions extends SiteRequestOptions {
  maxTextLength?: number;
  minTextLength?: number;
  strategies?: ContentStrategy[];
}

export interface PermissionOptions extends SiteRequestOptions {
  tosPaths?: string[];
}

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  now?: () => number;
}
