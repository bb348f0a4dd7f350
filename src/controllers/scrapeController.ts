import { Request, Response } from 'express';
import { z } from 'zod';
import { AppError } from '../middleware/errorHandler';
import { AppServices } from '../services/service.factory';
import logger from '../utils/logger';

const urlBodySchema = z.object({
  url: z.string(),
});

/**
 * Elapsed seconds since `startTime`, to two decimals
 */
const executionTime = (startTime: number) => Math.round((Date.now() - startTime) / 10) / 100;

/**
 * Extract the `url` field of a JSON body, or null when it is missing or not a string
 */
const readUrl = (body: unknown): string | null => {
  const parsed = urlBodySchema.safeParse(body);
  return parsed.success ? parsed.data.url : null;
};

export const createScrapeController = (services: AppServices) => {
  /**
   * POST /scrape: run the full pipeline for one URL
   */
  const scrape = async (req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      const url = readUrl(req.body);
      if (url === null) {
        return res.status(400).json({
          status: 'error',
          message: 'Missing URL parameter',
          execution_time: executionTime(startTime),
        });
      }

      const { operation, record } = await services.scrapeService.process(url);

      return res.status(200).json({
        status: 'success',
        message: `Data ${operation} successfully`,
        data: record,
        execution_time: executionTime(startTime),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (error instanceof AppError && error.statusCode === 400) {
        logger.warn(`Rejected scrape request: ${message}`);
        return res.status(400).json({
          status: 'error',
          message,
          execution_time: executionTime(startTime),
        });
      }

      logger.error(`Scraping error: ${message}`, {
        errorType: error instanceof Error ? error.name : typeof error,
        retryable: error instanceof AppError ? error.retryable : false,
      });
      return res.status(500).json({
        status: 'error',
        message: `Data processing failed: ${message}`,
        execution_time: executionTime(startTime),
      });
    }
  };

  /**
   * POST /check-permission: policy check only, nothing is fetched beyond probes
   */
  const checkPermission = async (req: Request, res: Response) => {
    const rawUrl = readUrl(req.body);
    if (rawUrl === null) {
      return res.status(400).json({ error: 'Missing URL parameter' });
    }

    const url = rawUrl.trim();
    const decision = await services.permissionEvaluator.evaluate(url);
    logger.debug(`Permission check for ${url}: ${decision.allowed ? 'allowed' : 'denied'} (${decision.reason})`);

    return res.status(200).json({
      url,
      scraping_allowed: decision.allowed,
      message: decision.reason,
    });
  };

  return { scrape, checkPermission };
};

export type ScrapeController = ReturnType<typeof createScrapeController>;
