import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { AppConfig } from '../config';
import { getPool } from '../config/database';
import { IEntityStore } from './entity-store/IEntityStore';
import { PgEntityStore } from './entity-store/PgEntityStore';
import { BedrockFieldExtractor, IFieldExtractor } from './field-extraction.service';
import { ScrapeService } from './scrape.service';
import { CheerioExtractor } from './scraper/implementations/CheerioExtractor';
import { DomainRateLimiter } from './scraper/implementations/DomainRateLimiter';
import { RobotsTxtService } from './scraper/implementations/RobotsTxtService';
import { SitePermissionEvaluator } from './scraper/implementations/SitePermissionEvaluator';
import { IContentExtractor } from './scraper/interfaces/IContentExtractor';
import { IPermissionEvaluator } from './scraper/interfaces/IPermissionEvaluator';
import { IRateLimiter } from './scraper/interfaces/IRateLimiter';
import { IRobotsTxtService } from './scraper/interfaces/IRobotsTxtService';

export interface ScraperServices {
  rateLimiter: IRateLimiter;
  robotsTxtService: IRobotsTxtService;
  permissionEvaluator: IPermissionEvaluator;
  contentExtractor: IContentExtractor;
}

export interface AppServices {
  scrapeService: ScrapeService;
  permissionEvaluator: IPermissionEvaluator;
}

/**
 * Build the site-facing components. Needs no credentials, so the CLI uses it directly.
 */
export function createScraperServices(config: AppConfig): ScraperServices {
  const { scraper } = config;

  const robotsTxtService = new RobotsTxtService({
    userAgent: scraper.userAgent,
    timeout: scraper.probeTimeoutMs,
    failMode: scraper.robotsFailMode,
  });

  return {
    rateLimiter: new DomainRateLimiter({
      maxRequests: config.rateLimit.maxRequests,
      windowMs: config.rateLimit.windowMs,
    }),
    robotsTxtService,
    permissionEvaluator: new SitePermissionEvaluator(robotsTxtService, {
      userAgent: scraper.userAgent,
      timeout: scraper.probeTimeoutMs,
    }),
    contentExtractor: new CheerioExtractor(robotsTxtService, {
      userAgent: scraper.userAgent,
      timeout: scraper.fetchTimeoutMs,
      maxTextLength: scraper.maxTextLength,
      minTextLength: scraper.minTextLength,
    }),
  };
}

export interface AppServiceOverrides {
  entityStore?: IEntityStore;
  fieldExtractor?: IFieldExtractor;
}

/**
 * Build everything the HTTP surface needs. Called once at process start so the rate
 * limiter's windows are shared by every request.
 */
export function createAppServices(config: AppConfig, overrides: AppServiceOverrides = {}): AppServices {
  const scraperServices = createScraperServices(config);

  const fieldExtractor = overrides.fieldExtractor ?? new BedrockFieldExtractor(
    new BedrockRuntimeClient({
      region: config.bedrock.region,
      requestHandler: { requestTimeout: config.bedrock.requestTimeoutMs },
    }),
    { modelId: config.bedrock.modelId, maxTokens: config.bedrock.maxTokens }
  );

  const entityStore = overrides.entityStore ?? new PgEntityStore(getPool(), config.database.table);

  return {
    scrapeService: new ScrapeService({
      rateLimiter: scraperServices.rateLimiter,
      contentExtractor: scraperServices.contentExtractor,
      fieldExtractor,
      entityStore,
    }),
    permissionEvaluator: scraperServices.permissionEvaluator,
  };
}
