/**
 * Extract API
 *
 * Upload a financial statement (PDF, TXT or DOCX) and receive an XLSX
 * workbook of the extracted line items.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  AppError,
  logger,
  runWithContext,
  runWithContextAsync,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isAppError,
  type Config,
  type ErrorResponse,
  type HealthResponse,
} from '@finsheet/shared';
import { buildReport } from './lib/report';
import { createUploadMiddleware } from './lib/upload';
import { XLSX_MIME } from './lib/workbook';

const CORRELATION_HEADER = 'X-Correlation-Id';

function correlationIdOf(res: Response): string {
  const header = res.getHeader(CORRELATION_HEADER);
  return typeof header === 'string' ? header : ulid();
}

export function createApp(config: Config): Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get(CORRELATION_HEADER) || ulid();
    res.setHeader(CORRELATION_HEADER, correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;
      const status = res.statusCode.toString();

      httpRequestDurationHistogram.observe({ method: req.method, path, status }, duration);
      httpRequestsCounter.inc({ method: req.method, path, status });

      runWithContext({ correlationId: correlationIdOf(res) }, () => {
        logger.info('Request completed', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration_ms: Math.round(duration * 1000),
        });
      });
    });

    next();
  });

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    const body: HealthResponse = { status: 'ok' };
    res.json(body);
  });

  // Metrics endpoint
  app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
    getMetrics()
      .then((metrics) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.send(metrics);
      })
      .catch(next);
  });

  /**
   * POST /api/extract
   * Multipart field "file"; responds with the XLSX report as an attachment.
   */
  app.post(
    '/api/extract',
    createUploadMiddleware(config),
    (req: Request, res: Response, next: NextFunction) => {
      const file = req.file;
      if (!file) {
        next(new AppError('no_file', 'No file provided'));
        return;
      }

      // The multipart parser runs outside the request context; re-enter it.
      const context = { correlationId: correlationIdOf(res), documentName: file.originalname };

      runWithContextAsync(context, async () => {
        const report = await buildReport(file, config);

        res.attachment(report.filename);
        res.type(XLSX_MIME);
        res.send(report.content);
      }).catch(next);
    }
  );

  // Error handler
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    runWithContext({ correlationId: correlationIdOf(res) }, () => {
      if (isAppError(error)) {
        logger.warn('Request failed', { code: error.code, error: error.message });
        const body: ErrorResponse = { error: error.message };
        res.status(error.statusCode).json(body);
        return;
      }

      logger.error('Unhandled request error', error);
      const body: ErrorResponse = { error: 'Internal server error' };
      res.status(500).json(body);
    });
  });

  return app;
}
