import * as cheerio from 'cheerio';
import { CheerioAPI } from 'cheerio';
import { ContentStrategy, ContentStrategyName } from '../interfaces/types';

/**
 * Elements that never hold readable content
 */
export const NOISE_SELECTOR = 'script, style, iframe, noscript';

/**
 * Content containers tried by the first stage, in priority order
 */
export const CONTENT_SELECTORS = [
  '#content', '#main-content', '.content', '.main-content',
  'article', 'main', '[role="main"]', '.post-content',
  '.entry-content', '.article-content'
];

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Load HTML, drop non-content elements, and pad every element with whitespace so
 * adjacent blocks read as separate words (`<p>a</p><p>b</p>` gives "a b", not "ab").
 */
export function loadDocument(html: string): CheerioAPI {
  const $ = cheerio.load(html);
  $(NOISE_SELECTOR).remove();
  $('*').each((_, element) => {
    $(element).prepend(' ').append(' ');
  });
  return $;
}

/**
 * Cleaned text of every element matching `selector`, optionally only those longer than `minLength`
 */
function textsOf($: CheerioAPI, selector: string, minLength = 0): string[] {
  return $(selector)
    .map((_, element) => collapseWhitespace($(element).text()))
    .get()
    .filter(text => text.length > minLength);
}

const nonEmpty = (segments: string[]): string[] | null => (segments.length > 0 ? segments : null);

interface BuiltInStrategy extends ContentStrategy {
  name: ContentStrategyName;
}

export const containerStrategy: BuiltInStrategy = {
  name: 'containers',
  // Nested matches (a `main` inside `#content`) contribute their text once per selector
  select: $ => nonEmpty(CONTENT_SELECTORS.flatMap(selector => textsOf($, selector))),
};

export const sectionStrategy: BuiltInStrategy = {
  name: 'sections',
  select: $ => nonEmpty(textsOf($, 'article, main, section', 100)),
};

export const paragraphStrategy: BuiltInStrategy = {
  name: 'paragraphs',
  select: $ => nonEmpty(textsOf($, 'p', 50)),
};

export const blockStrategy: BuiltInStrategy = {
  name: 'blocks',
  select: $ => nonEmpty(textsOf($, 'div', 100)),
};

export const documentStrategy: BuiltInStrategy = {
  name: 'document',
  select: $ => {
    const text = collapseWhitespace($.root().text());
    return text ? [text] : null;
  },
};

/**
 * Each stage is more permissive than the one before it
 */
export const DEFAULT_STRATEGIES: ContentStrategy[] = [
  containerStrategy,
  sectionStrategy,
  paragraphStrategy,
  blockStrategy,
  documentStrategy,
];

export interface CascadeResult {
  strategy: string;
  text: string;
}

/**
 * Run the strategies in order and return the joined, whitespace-collapsed text of the
 * first one that selects anything. Null when every stage came up empty.
 */
export function runContentCascade($: CheerioAPI, strategies: ContentStrategy[] = DEFAULT_STRATEGIES): CascadeResult | null {
  for (const strategy of strategies) {
    const segments = strategy.select($);
    if (segments && segments.length > 0) {
      return { strategy: strategy.name, text: collapseWhitespace(segments.join(' ')) };
    }
  }
  return null;
}
