/**
 * Parser API
 *
 * POST /api/v1/parse/upload              - Accepts a PDF statement and enqueues parsing
 * GET  /api/v1/parse/status/:taskId      - Current TaskResult for a task
 * GET  /api/v1/parse/download/:taskId    - Structured data of a finished task, as a file
 */

import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import { ulid } from 'ulid';
import { v4 as uuidv4, validate as uuidValidate, version as uuidVersion } from 'uuid';
import {
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  config,
  QUEUE_NAMES,
  type CountableQueue,
  type ParseStatementJob,
  type UploadAccepted,
  type ErrorEnvelope,
} from '@statement-parser/shared';
import { apiKeyAuth, SlidingWindowRateLimiter } from './lib/auth';
import { taskResultFromJob, type TaskJob } from './lib/status';

const PDF_MAGIC = Buffer.from('%PDF');
const ESTIMATED_TIME_SECONDS = 30;
const DEFAULT_FILENAME = 'statement.pdf';

/**
 * The queue operations the API needs; a BullMQ Queue satisfies it.
 */
export interface TaskQueue extends CountableQueue {
  add(name: string, data: ParseStatementJob, opts?: { jobId?: string }): Promise<unknown>;
  getJob(jobId: string): Promise<TaskJob | undefined>;
}

export interface ApiSettings {
  apiPrefix: string;
  masterApiKey: string;
  apiKeyHeaderName: string;
  rateLimitPerMinute: number;
  maxUploadSizeMb: number;
}

export interface AppDependencies {
  queue: TaskQueue;
  settings?: Partial<ApiSettings>;
  limiter?: SlidingWindowRateLimiter;
}

function correlationIdOf(res: Response): string {
  const header: unknown = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : '';
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationIdOf(res) },
  };
  res.status(status).json(error);
}

function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function isTaskId(value: string): boolean {
  return uuidValidate(value) && uuidVersion(value) === 4;
}

function headerFilename(req: Request): string {
  const raw = req.get('X-Filename');
  if (!raw) return DEFAULT_FILENAME;
  const name = raw.replace(/[\r\n"]/g, '').trim();
  return name || DEFAULT_FILENAME;
}

interface HttpError {
  status: number;
  type?: string;
}

function isHttpError(err: unknown): err is HttpError {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

export function createApp(deps: AppDependencies): express.Express {
  const settings: ApiSettings = {
    apiPrefix: config.apiPrefix,
    masterApiKey: config.masterApiKey,
    apiKeyHeaderName: config.apiKeyHeaderName,
    rateLimitPerMinute: config.rateLimitPerMinute,
    maxUploadSizeMb: config.maxUploadSizeMb,
    ...deps.settings,
  };
  const { queue } = deps;
  const limiter = deps.limiter ?? new SlidingWindowRateLimiter(settings.rateLimitPerMinute);
  const maxUploadBytes = settings.maxUploadSizeMb * 1024 * 1024;

  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.get('X-Correlation-Id');
    const correlationId = header || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get(
    '/health',
    asyncHandler(async (req: Request, res: Response) => {
      try {
        const backpressure = await checkBackpressure(queue);

        res.json({
          status: 'healthy',
          service: 'parser-api',
          queue_depth: backpressure.depth,
          timestamp: new Date().toISOString(),
        });
      } catch (error) {
        res.status(503).json({
          status: 'unhealthy',
          service: 'parser-api',
          error: error instanceof Error ? error.message : 'Unknown error',
          timestamp: new Date().toISOString(),
        });
      }
    })
  );

  // Metrics endpoint
  app.get(
    '/metrics',
    asyncHandler(async (req: Request, res: Response) => {
      await reportQueueMetrics([{ name: QUEUE_NAMES.PARSE_STATEMENT, queue }]);
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    })
  );

  const router = express.Router();

  router.use(
    apiKeyAuth({
      masterApiKey: settings.masterApiKey,
      headerName: settings.apiKeyHeaderName,
      limiter,
    })
  );

  /**
   * POST /parse/upload
   * Body is the raw PDF (Content-Type: application/pdf); X-Filename is optional.
   */
  router.post(
    '/parse/upload',
    (req: Request, res: Response, next: NextFunction) => {
      if (!req.is('application/pdf')) {
        sendError(
          res,
          415,
          'unsupported_media_type',
          `Invalid file type: ${req.get('Content-Type') || 'none'}. Only PDF files are accepted.`
        );
        return;
      }
      next();
    },
    express.raw({ type: 'application/pdf', limit: maxUploadBytes }),
    asyncHandler(async (req: Request, res: Response) => {
      const body: unknown = req.body;

      if (!Buffer.isBuffer(body) || body.length === 0) {
        sendError(res, 400, 'invalid_request', 'Uploaded file is empty.');
        return;
      }

      if (body.length < PDF_MAGIC.length || !body.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) {
        sendError(res, 415, 'unsupported_media_type', 'Uploaded file is not a PDF document.');
        return;
      }

      const backpressure = await checkBackpressure(queue);

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Upload rejected due to backpressure', {
          queue_depth: backpressure.depth,
        });
        sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', {
          queue_depth: backpressure.depth,
        });
      }

      const taskId = uuidv4();
      const filename = headerFilename(req);
      const job: ParseStatementJob = {
        task_id: taskId,
        document_base64: body.toString('base64'),
        filename,
        created_at: new Date().toISOString(),
      };

      await queue.add(QUEUE_NAMES.PARSE_STATEMENT, job, { jobId: taskId });

      logger.info('Statement queued', {
        taskId,
        filename,
        size_bytes: body.length,
      });

      const accepted: UploadAccepted = {
        task_id: taskId,
        status: 'PENDING',
        detail: 'Statement accepted for parsing. Poll the status endpoint for progress.',
        estimated_time_seconds: ESTIMATED_TIME_SECONDS,
      };
      res.status(202).json(accepted);
    })
  );

  /**
   * GET /parse/status/:taskId
   */
  router.get(
    '/parse/status/:taskId',
    asyncHandler(async (req: Request, res: Response) => {
      const { taskId } = req.params;

      if (!isTaskId(taskId)) {
        sendError(res, 422, 'invalid_task_id', 'task_id must be a UUID v4.');
        return;
      }

      const job = await queue.getJob(taskId);
      const result = job ? await taskResultFromJob(taskId, job) : null;

      if (!result) {
        sendError(res, 404, 'not_found', 'Task not found.');
        return;
      }

      res.json(result);
    })
  );

  /**
   * GET /parse/download/:taskId
   * Only SUCCESS results are downloadable.
   */
  router.get(
    '/parse/download/:taskId',
    asyncHandler(async (req: Request, res: Response) => {
      const { taskId } = req.params;

      if (!isTaskId(taskId)) {
        sendError(res, 422, 'invalid_task_id', 'task_id must be a UUID v4.');
        return;
      }

      const job = await queue.getJob(taskId);
      const result = job ? await taskResultFromJob(taskId, job) : null;

      if (!result || result.status === 'PENDING' || result.status === 'PROCESSING') {
        sendError(
          res,
          404,
          'not_found',
          'Result not available. The task is pending, processing, or does not exist.'
        );
        return;
      }

      if (result.status === 'FAILED' || !result.data) {
        sendError(
          res,
          400,
          'task_failed',
          `Task failed and has no result to download. Error: ${result.error ?? 'unknown'}`
        );
        return;
      }

      res.setHeader('Content-Disposition', `attachment; filename="parsing_result_${taskId}.json"`);
      res.json(result.data);
    })
  );

  app.use(settings.apiPrefix, router);

  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `No route for ${req.method} ${req.path}`);
  });

  // Error handler: body parser errors carry an HTTP status
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isHttpError(err) && err.type === 'entity.too.large') {
      sendError(
        res,
        413,
        'payload_too_large',
        `File exceeds maximum allowed size (${settings.maxUploadSizeMb}MB).`
      );
      return;
    }

    if (isHttpError(err) && err.status >= 400 && err.status < 500) {
      sendError(res, err.status, 'invalid_request', 'Request body could not be read.');
      return;
    }

    logger.error('Unhandled request error', err);
    sendError(res, 500, 'internal_error', 'An internal error occurred. Please try again later.');
  });

  return app;
}
