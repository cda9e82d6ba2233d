// src/api/server.ts - Builds the Express app; index.ts binds it to a port
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { createApiRouter } from './routes';
import { CheckController } from './controllers/check.controller';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { getCheckerHtml } from './page';
import { PhishyCheckService } from '../analysis/phishy-check-service';
import { RecentPhishyLog } from '../services/recent-phishy-log';
import { config } from '../config';

export interface AppDependencies {
  checkService?: PhishyCheckService;
  recentLog?: RecentPhishyLog;
  corsOrigin?: string;
}

export function createApp(deps: AppDependencies = {}): express.Application {
  const checkService = deps.checkService ?? new PhishyCheckService();
  const recentLog = deps.recentLog ?? new RecentPhishyLog(config.RECENT_PHISHY_LIMIT);
  const controller = new CheckController(checkService, recentLog);

  const app = express();

  // Setup middleware
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        // The page ships its renderer inline
        scriptSrc: ["'self'", "'unsafe-inline'"],
      },
    },
  }));
  app.use(cors({
    origin: deps.corsOrigin ?? config.CORS_ORIGIN,
  }));
  app.use(compression());
  app.use(express.json());
  app.use(requestLogger);

  // Routes
  app.get('/', (req, res) => {
    res.type('html').send(getCheckerHtml());
  });

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  // API routes
  app.use('/api', createApiRouter(controller));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: `Route ${req.method} ${req.path} not found`
    });
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
