/**
 * Mailer HTTP API Server
 *
 * Express app behind the site's enquiry form. The form page itself is served
 * elsewhere; this only receives submissions.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { createServer, Server as HttpServer } from 'http';
import { getLogger, registerComponent } from '../logging/index.js';
import type { EnquirySettings } from '../config/MailerConfig.js';
import type { EnquiryService } from '../enquiry/EnquiryService.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { createEnquiryRouter } from './servlets/EnquiryServlet.js';

registerComponent('api', 'HTTP API server');
const logger = getLogger('api');

export interface AppOptions {
  enquiryService: EnquiryService;
  enquirySettings: Pick<EnquirySettings, 'rateLimit' | 'rateWindowMinutes'>;
  /** Number of reverse proxies in front of the app, for client IPs in rate limiting */
  trustProxy?: number;
}

/**
 * Create and configure Express application
 */
export function createApp(options: AppOptions): Express {
  const app = express();

  if (options.trustProxy !== undefined) {
    app.set('trust proxy', options.trustProxy);
  }

  // Security headers via helmet (CSP disabled for API-only server)
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(requestIdMiddleware(logger));

  app.use(express.json({ limit: '64kb' }));
  app.use(express.urlencoded({ extended: false, limit: '64kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/enquiries', createEnquiryRouter(options.enquiryService, options.enquirySettings));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: 'The requested resource was not found',
    });
  });

  // Error handler: suppress error details in production
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    // Body parser errors (malformed JSON, oversized body) carry their own 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 400 && status < 500) {
      res.status(status).json({ error: 'Bad Request', message: err.message });
      return;
    }

    logger.error('API error', err, { requestId: req.requestId });
    const isProd = process.env.NODE_ENV === 'production';
    res.status(500).json({
      error: 'Internal Server Error',
      message: isProd ? 'An unexpected error occurred' : err.message,
    });
  });

  return app;
}

/**
 * Start listening. Resolves once the port is bound.
 */
export function startServer(app: Express, host: string, port: number): Promise<HttpServer> {
  const server = createServer(app);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.removeListener('error', reject);
      logger.info(`Mailer API listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}
