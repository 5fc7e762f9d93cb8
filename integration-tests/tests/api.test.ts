/**
 * Parser API Tests
 *
 * Drives the Express app over HTTP against an in-memory queue.
 */

import { StatementParsingEngine, buildTaskResult, failedTaskResult } from '@statement-parser/shared';
import { createApp, type ApiSettings } from '../../services/parser-api/src/app';
import { SlidingWindowRateLimiter } from '../../services/parser-api/src/lib/auth';
import {
  FakeAcquisition,
  FakeQueue,
  loadStatement,
  readJson,
  startServer,
  type RunningServer,
} from './helpers';

const API_KEY = 'test-secret';
const TASK_ID = '3d7b9c1e-5f2a-4b6c-8d0e-1a2b3c4d5e6f';
const PDF_BODY = Buffer.from('%PDF-1.4\n% test statement\n');

const settings: ApiSettings = {
  apiPrefix: '/api/v1',
  masterApiKey: API_KEY,
  apiKeyHeaderName: 'X-API-Key',
  rateLimitPerMinute: 100,
  maxUploadSizeMb: 1,
};

const timing = {
  createdAt: '2026-01-05T10:00:00.000Z',
  startedAt: new Date('2026-01-05T10:00:01.000Z'),
  completedAt: new Date('2026-01-05T10:00:03.000Z'),
};

describe('Parser API', () => {
  let queue: FakeQueue;
  let server: RunningServer;

  async function start(overrides: Partial<ApiSettings> = {}, limiter?: SlidingWindowRateLimiter) {
    queue = new FakeQueue();
    server = await startServer(createApp({ queue, settings: { ...settings, ...overrides }, limiter }));
  }

  function url(path: string): string {
    return `${server.baseUrl}${path}`;
  }

  function upload(body: Buffer | string, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(url('/api/v1/parse/upload'), {
      method: 'POST',
      headers: { 'X-API-Key': API_KEY, 'Content-Type': 'application/pdf', ...headers },
      body,
    });
  }

  function get(path: string, headers: Record<string, string> = { 'X-API-Key': API_KEY }) {
    return fetch(url(path), { headers });
  }

  afterEach(async () => {
    await server.close();
  });

  describe('GET /health', () => {
    beforeEach(() => start());

    it('reports queue depth without authentication', async () => {
      queue.waiting = 3;
      queue.active = 1;

      const response = await fetch(url('/health'));

      expect(response.status).toBe(200);
      expect(await readJson(response)).toMatchObject({
        status: 'healthy',
        service: 'parser-api',
        queue_depth: 4,
      });
    });
  });

  describe('authentication', () => {
    it('rejects requests without a key', async () => {
      await start();

      const response = await get(`/api/v1/parse/status/${TASK_ID}`, { 'X-Correlation-Id': 'corr-1' });

      expect(response.status).toBe(401);
      expect(response.headers.get('www-authenticate')).toBe('ApiKey');
      expect(await readJson(response)).toEqual({
        error: {
          code: 'unauthorized',
          message: 'Missing API key in X-API-Key header.',
          correlation_id: 'corr-1',
        },
      });
    });

    it('rejects a wrong key', async () => {
      await start();

      const response = await get(`/api/v1/parse/status/${TASK_ID}`, { 'X-API-Key': 'wrong-secret' });

      expect(response.status).toBe(401);
      expect(await readJson(response)).toMatchObject({
        error: { code: 'unauthorized', message: 'Invalid or missing API key.' },
      });
    });

    it('fails closed when no master key is configured', async () => {
      await start({ masterApiKey: '' });

      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(response.status).toBe(500);
      expect(await readJson(response)).toMatchObject({ error: { code: 'server_misconfigured' } });
    });

    it('rate limits per key', async () => {
      await start({}, new SlidingWindowRateLimiter(1, 60_000, () => 0));

      const first = await get(`/api/v1/parse/status/${TASK_ID}`);
      expect(first.status).toBe(404);
      expect(first.headers.get('x-ratelimit-limit')).toBe('1');
      expect(first.headers.get('x-ratelimit-remaining')).toBe('0');

      const second = await get(`/api/v1/parse/status/${TASK_ID}`);
      expect(second.status).toBe(429);
      expect(second.headers.get('retry-after')).toBe('60');
      expect(await readJson(second)).toMatchObject({
        error: { code: 'rate_limited', message: 'Rate limit exceeded. Max 1 requests per minute.' },
      });
    });
  });

  describe('POST /api/v1/parse/upload', () => {
    beforeEach(() => start());

    it('queues a PDF and returns a task id', async () => {
      const response = await upload(PDF_BODY, { 'X-Filename': 'december.pdf' });

      expect(response.status).toBe(202);
      expect(response.headers.get('x-ratelimit-remaining')).toBe('99');

      const [added] = queue.added;
      expect(queue.added).toHaveLength(1);
      expect(added?.name).toBe('parse_statement');
      expect(added?.jobId).toBe(added?.data.task_id);
      expect(added?.data.filename).toBe('december.pdf');
      expect(Buffer.from(added?.data.document_base64 ?? '', 'base64').equals(PDF_BODY)).toBe(true);
      expect(added?.data.task_id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );

      expect(await readJson(response)).toEqual({
        task_id: added?.data.task_id,
        status: 'PENDING',
        detail: 'Statement accepted for parsing. Poll the status endpoint for progress.',
        estimated_time_seconds: 30,
      });
    });

    it('defaults the filename', async () => {
      await upload(PDF_BODY);

      expect(queue.added[0]?.data.filename).toBe('statement.pdf');
    });

    it('rejects other content types', async () => {
      const response = await upload('hello', { 'Content-Type': 'text/plain' });

      expect(response.status).toBe(415);
      expect(await readJson(response)).toMatchObject({
        error: {
          code: 'unsupported_media_type',
          message: 'Invalid file type: text/plain. Only PDF files are accepted.',
        },
      });
      expect(queue.added).toHaveLength(0);
    });

    it('rejects a body that is not a PDF', async () => {
      const response = await upload('hello');

      expect(response.status).toBe(415);
      expect(await readJson(response)).toMatchObject({
        error: { message: 'Uploaded file is not a PDF document.' },
      });
    });

    it('rejects an empty body', async () => {
      const response = await upload('');

      expect(response.status).toBe(400);
      expect(await readJson(response)).toMatchObject({
        error: { code: 'invalid_request', message: 'Uploaded file is empty.' },
      });
    });

    it('rejects files over the size limit', async () => {
      const oversized = Buffer.concat([PDF_BODY, Buffer.alloc(1024 * 1024)]);

      const response = await upload(oversized);

      expect(response.status).toBe(413);
      expect(await readJson(response)).toMatchObject({
        error: {
          code: 'payload_too_large',
          message: 'File exceeds maximum allowed size (1MB).',
        },
      });
    });

    it('sheds load when the queue is too deep', async () => {
      queue.waiting = 1000;

      const response = await upload(PDF_BODY);

      expect(response.status).toBe(503);
      expect(queue.added).toHaveLength(0);
    });
  });

  describe('GET /api/v1/parse/status/:taskId', () => {
    beforeEach(() => start());

    it('rejects ids that are not UUID v4', async () => {
      const response = await get('/api/v1/parse/status/not-a-uuid');

      expect(response.status).toBe(422);
    });

    it('returns 404 for unknown tasks', async () => {
      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(response.status).toBe(404);
      expect(await readJson(response)).toMatchObject({
        error: { code: 'not_found', message: 'Task not found.' },
      });
    });

    it('reports waiting jobs as PENDING', async () => {
      queue.seed(TASK_ID, 'waiting');

      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(response.status).toBe(200);
      expect(await readJson(response)).toMatchObject({
        task_id: TASK_ID,
        status: 'PENDING',
        started_at: null,
      });
    });

    it('reports active jobs as PROCESSING', async () => {
      const job = queue.seed(TASK_ID, 'active');
      job.processedOn = Date.parse('2026-01-05T10:00:01.000Z');

      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(await readJson(response)).toMatchObject({
        status: 'PROCESSING',
        started_at: '2026-01-05T10:00:01.000Z',
      });
    });

    it('reports jobs waiting out a retry backoff as PENDING', async () => {
      queue.seed(TASK_ID, 'delayed');

      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(await readJson(response)).toMatchObject({ status: 'PENDING', started_at: null });
    });

    it('returns the stored result of completed jobs', async () => {
      const engine = new StatementParsingEngine({ acquisition: new FakeAcquisition('') });
      const result = buildTaskResult(TASK_ID, engine.parseText(loadStatement('amex')), timing);
      queue.seed(TASK_ID, 'completed').returnvalue = result;

      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(response.status).toBe(200);
      expect(await readJson(response)).toEqual(result);
    });

    it('reports failed jobs with their failure reason', async () => {
      const job = queue.seed(TASK_ID, 'failed');
      job.failedReason = 'worker crashed';
      job.processedOn = Date.parse('2026-01-05T10:00:01.000Z');
      job.finishedOn = Date.parse('2026-01-05T10:00:02.000Z');

      const response = await get(`/api/v1/parse/status/${TASK_ID}`);

      expect(await readJson(response)).toMatchObject({
        status: 'FAILED',
        error: 'worker crashed',
        processing_time_ms: 1000,
      });
    });
  });

  describe('GET /api/v1/parse/download/:taskId', () => {
    beforeEach(() => start());

    it('returns 404 while the task is pending', async () => {
      queue.seed(TASK_ID, 'waiting');

      const response = await get(`/api/v1/parse/download/${TASK_ID}`);

      expect(response.status).toBe(404);
    });

    it('returns 400 for failed tasks', async () => {
      queue.seed(TASK_ID, 'completed').returnvalue = failedTaskResult(
        TASK_ID,
        'No text layer found and OCR is disabled',
        'NoExtractableTextError',
        timing
      );

      const response = await get(`/api/v1/parse/download/${TASK_ID}`);

      expect(response.status).toBe(400);
      expect(await readJson(response)).toMatchObject({
        error: {
          code: 'task_failed',
          message:
            'Task failed and has no result to download. Error: No text layer found and OCR is disabled',
        },
      });
    });

    it('serves the structured data as an attachment', async () => {
      const engine = new StatementParsingEngine({ acquisition: new FakeAcquisition('') });
      const result = buildTaskResult(TASK_ID, engine.parseText(loadStatement('chase')), timing);
      queue.seed(TASK_ID, 'completed').returnvalue = result;

      const response = await get(`/api/v1/parse/download/${TASK_ID}`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-disposition')).toBe(
        `attachment; filename="parsing_result_${TASK_ID}.json"`
      );
      expect(await readJson(response)).toEqual(result.data);
    });
  });

  it('answers unknown routes with an error envelope', async () => {
    await start();

    const response = await fetch(url('/nope'), { headers: { 'X-Correlation-Id': 'corr-2' } });

    expect(response.status).toBe(404);
    expect(await readJson(response)).toEqual({
      error: { code: 'not_found', message: 'No route for GET /nope', correlation_id: 'corr-2' },
    });
  });
});
