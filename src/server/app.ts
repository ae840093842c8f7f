import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { THRESHOLD_MAX, THRESHOLD_MIN } from '../config/scanConfig.js';
import { ErrorCode, Errors, ScannerError, ValidationError, createError } from '../core/errors.js';
import { recordsToCsv } from '../core/historyStore.js';
import { createModuleLogger } from '../core/logger.js';
import { Scanner, executeScan } from '../scan/executeScan.js';

const log = createModuleLogger('api');

export interface AppOptions {
  /** Required in x-api-key when set */
  apiKey?: string;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

const scanBodySchema = z.object({
  domains: z.union([z.string(), z.array(z.string())]),
  threshold: z.number().min(THRESHOLD_MIN).max(THRESHOLD_MAX).optional(),
});

/**
 * Timing-safe comparison for API keys
 */
function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function statusFor(err: ScannerError): number {
  return err instanceof ValidationError ? 400 : 500;
}

export function createApp(scanner: Scanner, options: AppOptions): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  const requireApiKey: express.RequestHandler = (req, res, next) => {
    if (req.path === '/health' || !options.apiKey) return next();

    const providedKey = req.get('x-api-key');
    if (!providedKey || !safeCompare(providedKey, options.apiKey)) {
      res.status(401).json(Errors.unauthorized());
      return;
    }
    next();
  };
  app.use(requireApiKey);

  const scanRateLimiter = rateLimit({
    windowMs: options.rateLimitWindowMs,
    limit: options.rateLimitMax,
    message: Errors.rateLimited(),
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', strategy: scanner.config.strategy });
  });

  app.post('/scan', scanRateLimiter, async (req, res, next) => {
    const parsed = scanBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(createError(ErrorCode.VALIDATION_INVALID_OPTION, 'Invalid scan request', {
        details: { issues: parsed.error.issues.map(i => ({ field: i.path.join('.'), message: i.message })) },
      }));
      return;
    }

    // Stop scanning when the client goes away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await executeScan(scanner, { ...parsed.data, signal: controller.signal });
      if (req.query.format === 'csv') {
        res
          .type('text/csv')
          .attachment(`${result.scanId}.csv`)
          .send(recordsToCsv(result.findings));
        return;
      }
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  app.get('/history', async (_req, res, next) => {
    try {
      res.json({ records: await scanner.history.loadRecent() });
    } catch (err) {
      next(err);
    }
  });

  app.get('/history.csv', async (_req, res, next) => {
    try {
      const records = await scanner.history.loadRecent();
      res
        .type('text/csv')
        .attachment('history.csv')
        .send(recordsToCsv(records));
    } catch (err) {
      next(err);
    }
  });

  app.delete('/history', async (_req, res, next) => {
    try {
      await scanner.history.clear();
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  const errorHandler: express.ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (err instanceof ScannerError) {
      log.warn({ err, path: req.path }, 'Request failed');
      res.status(statusFor(err)).json(err.toApiError());
      return;
    }
    log.error({ err, path: req.path }, 'Unhandled request error');
    res.status(500).json(Errors.internal());
  };
  app.use(errorHandler);

  return app;
}
