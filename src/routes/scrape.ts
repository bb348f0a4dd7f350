import express, { NextFunction, Request, Response } from 'express';
import { ScrapeController } from '../controllers/scrapeController';

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error handler by itself
const forwardErrors = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export const createScrapeRouter = (controller: ScrapeController) => {
  const router = express.Router();

  router.post('/scrape', forwardErrors(controller.scrape));
  router.post('/check-permission', forwardErrors(controller.checkPermission));

  return router;
};
