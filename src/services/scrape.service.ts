import { CallerInputError, PolicyDeniedError, StoreError } from '../middleware/errorHandler';
import { EntityRecordInput, ScrapeOutcome } from '../types/entity';
import logger from '../utils/logger';
import { ContactNormalizerService } from './contact-normalizer.service';
import { IEntityStore } from './entity-store/IEntityStore';
import { parseEntityResponse } from './entity-response.parser';
import { IFieldExtractor } from './field-extraction.service';
import { IContentExtractor } from './scraper/interfaces/IContentExtractor';
import { IRateLimiter } from './scraper/interfaces/IRateLimiter';
import { UrlUtils } from './scraper/utils/UrlUtils';

export interface ScrapeServiceDependencies {
  rateLimiter: IRateLimiter;
  contentExtractor: IContentExtractor;
  fieldExtractor: IFieldExtractor;
  entityStore: IEntityStore;
  contactNormalizer?: ContactNormalizerService;
  now?: () => Date;
}

/**
 * Turns one URL into one persisted entity record:
 * rate limit, store lookup, extract, model call, parse, normalize, upsert.
 *
 * Steps run strictly in sequence and nothing is retried; the first failure ends the
 * run with a typed AppError.
 */
export class ScrapeService {
  private readonly rateLimiter: IRateLimiter;
  private readonly contentExtractor: IContentExtractor;
  private readonly fieldExtractor: IFieldExtractor;
  private readonly entityStore: IEntityStore;
  private readonly contactNormalizer: ContactNormalizerService;
  private readonly now: () => Date;

  constructor(dependencies: ScrapeServiceDependencies) {
    this.rateLimiter = dependencies.rateLimiter;
    this.contentExtractor = dependencies.contentExtractor;
    this.fieldExtractor = dependencies.fieldExtractor;
    this.entityStore = dependencies.entityStore;
    this.contactNormalizer = dependencies.contactNormalizer ?? new ContactNormalizerService();
    this.now = dependencies.now ?? (() => new Date());
  }

  async process(rawUrl: string): Promise<ScrapeOutcome> {
    const url = rawUrl.trim();
    if (!url) {
      throw new CallerInputError('Empty URL provided');
    }
    if (!UrlUtils.isHttpUrl(url)) {
      throw new CallerInputError('Invalid URL provided');
    }

    if (!this.rateLimiter.check(url)) {
      throw new PolicyDeniedError('Rate limit exceeded for this domain');
    }

    const existing = await this.entityStore.findByWebsite(url);

    const document = await this.contentExtractor.extract(url);
    logger.info(`Extracted ${document.text.length} chars from ${url} via ${document.strategy}`);

    const answer = await this.fieldExtractor.extractFields(document.text, url);
    const fields = parseEntityResponse(answer);

    const timestamp = this.now().toISOString();
    const record: EntityRecordInput = {
      ...fields,
      slug: fields.slug ?? '',
      contact_email: this.contactNormalizer.normalize(fields.contact_email),
      // The requested URL is the record's key, whatever the model read off the page
      website: url,
      updated_at: timestamp,
    };

    if (existing) {
      const updated = await this.entityStore.update(existing.id, record);
      if (!updated) {
        throw new StoreError('Failed to update record in store');
      }
      logger.info(`Updated entity ${updated.id} for ${url}`);
      return { operation: 'updated', record: updated };
    }

    const created = await this.entityStore.insert({ ...record, created_at: timestamp });
    if (!created) {
      throw new StoreError('Failed to insert record into store');
    }
    logger.info(`Created entity ${created.id} for ${url}`);
    return { operation: 'created', record: created };
  }
}
