import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import config from './config';
import { createScrapeController } from './controllers/scrapeController';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import healthRoutes from './routes/health';
import { createScrapeRouter } from './routes/scrape';
import { AppServices } from './services/service.factory';

/**
 * Create the Express app around already-built services
 */
export const createApp = (services: AppServices) => {
  const app = express();

  // Apply security middleware
  app.use(helmet());
  app.use(cors({
    origin: config.security.corsOrigin,
  }));

  // Parse JSON bodies
  app.use(express.json());

  // Routes
  app.use('/health', healthRoutes);
  app.use('/', createScrapeRouter(createScrapeController(services)));

  app.use(notFoundHandler);

  // Error handling - must be after routes
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    errorHandler(err, req, res, next);
  });

  return app;
};
