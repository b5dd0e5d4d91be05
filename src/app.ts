import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet()); // Set security HTTP headers
  app.use(hpp()); // Prevent HTTP Parameter Pollution

  // CORS configuration
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like mobile apps or curl)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;
        
        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
      // Browsers need it to read the summary.csv filename
      exposedHeaders: ['Content-Disposition'],
    })
  );

  // Rate limiting; probes are exempt
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    skip: (req) => req.path.startsWith(`${env.API_PREFIX}/health`),
    message: {
      success: false,
      error: 'Too many requests; poll job status less often or retry later',
      timestamp: new Date().toISOString(),
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(limiter);

  // Uploads are multipart and parsed by multer on their route; JSON bodies stay small
  app.use(express.json({ limit: '100kb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Facility Metrics Reconciliation API',
      version: '1.0.0',
      endpoints: {
        upload: `POST ${env.API_PREFIX}/jobs/upload`,
        jobs: `GET ${env.API_PREFIX}/jobs`,
        status: `GET ${env.API_PREFIX}/jobs/:jobId`,
        summary: `GET ${env.API_PREFIX}/jobs/:jobId/summary`,
        summaryCsv: `GET ${env.API_PREFIX}/jobs/:jobId/summary.csv`,
        health: `GET ${env.API_PREFIX}/health`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Handle 404 - Route not found
  app.use(notFound);

  // Global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
