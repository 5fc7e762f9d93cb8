/**
 * Test Helpers
 *
 * Statement fixtures, in-process stand-ins for the queue and text
 * acquisition, and an ephemeral HTTP server.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Server } from 'http';
import type { Express } from 'express';
import type {
  OcrConfig,
  ParseStatementJob,
  TaskResult,
  TextAcquisition,
} from '@statement-parser/shared';
import type { TaskQueue } from '../../services/parser-api/src/app';
import type { TaskJob } from '../../services/parser-api/src/lib/status';

const FIXTURES_DIR = path.join(__dirname, '../../fixtures/statements');

export type StatementFixture = 'amex' | 'chase' | 'bank-of-america' | 'citi' | 'capital-one';

export function loadStatement(name: StatementFixture): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, `${name}.txt`), 'utf-8');
}

// ============================================================================
// PDF
// ============================================================================

function pdfString(text: string): string {
  return `(${text.replace(/[\\()]/g, (char) => `\\${char}`)})`;
}

/**
 * Build a minimal PDF with a Helvetica text layer: one entry per page, one
 * text line per array element.
 */
export function buildPdf(pages: string[][]): Buffer {
  const fontId = 3;
  const firstPageId = 4;
  const pageIds = pages.map((_, index) => firstPageId + index * 2);

  const objects: string[] = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(' ')}] /Count ${pages.length} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  pages.forEach((lines, index) => {
    const contentId = pageIds[index] + 1;
    const stream = ['BT', '/F1 11 Tf', '14 TL', '72 720 Td']
      .concat(lines.map((line, lineIndex) => `${lineIndex === 0 ? '' : 'T* '}${pdfString(line)} Tj`))
      .concat('ET')
      .join('\n');

    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
        `/Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${contentId} 0 R >>`,
      `<< /Length ${Buffer.byteLength(stream, 'latin1')} >>\nstream\n${stream}\nendstream`
    );
  });

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, index) => {
    offsets.push(Buffer.byteLength(body, 'latin1'));
    body += `${index + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(body, 'latin1');
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, 'latin1');
}

// ============================================================================
// Text Acquisition
// ============================================================================

export class FakeAcquisition implements TextAcquisition {
  readonly nativeCalls: Uint8Array[] = [];
  readonly ocrCalls: OcrConfig[] = [];

  constructor(
    private readonly nativeText: string | Error,
    private readonly ocrText: string = ''
  ) {}

  async extractNativeText(document: Uint8Array): Promise<string> {
    this.nativeCalls.push(document);
    if (this.nativeText instanceof Error) throw this.nativeText;
    return this.nativeText;
  }

  async recognizeText(document: Uint8Array, ocr: OcrConfig): Promise<string> {
    this.ocrCalls.push(ocr);
    return this.ocrText;
  }
}

// ============================================================================
// Queue
// ============================================================================

export class FakeJob implements TaskJob {
  returnvalue: TaskResult | null = null;
  failedReason?: string;
  timestamp = Date.parse('2026-01-05T10:00:00.000Z');
  processedOn?: number;
  finishedOn?: number;

  constructor(
    readonly id: string,
    readonly data: ParseStatementJob,
    public state: string = 'waiting'
  ) {}

  async getState(): Promise<string> {
    return this.state;
  }
}

export interface AddedJob {
  name: string;
  data: ParseStatementJob;
  jobId: string | undefined;
}

export class FakeQueue implements TaskQueue {
  readonly jobs = new Map<string, FakeJob>();
  readonly added: AddedJob[] = [];
  waiting = 0;
  active = 0;

  async add(name: string, data: ParseStatementJob, opts?: { jobId?: string }): Promise<FakeJob> {
    const jobId = opts?.jobId;
    this.added.push({ name, data, jobId });
    const job = new FakeJob(jobId ?? String(this.added.length), data);
    this.jobs.set(job.id, job);
    return job;
  }

  async getJob(jobId: string): Promise<FakeJob | undefined> {
    return this.jobs.get(jobId);
  }

  /**
   * Put a job into the queue directly, as if a worker had touched it.
   */
  seed(taskId: string, state: string): FakeJob {
    const job = new FakeJob(taskId, {
      task_id: taskId,
      document_base64: '',
      filename: 'statement.pdf',
      created_at: '2026-01-05T10:00:00.000Z',
    }, state);
    this.jobs.set(taskId, job);
    return job;
  }

  async getWaitingCount(): Promise<number> {
    return this.waiting;
  }

  async getActiveCount(): Promise<number> {
    return this.active;
  }

  async getCompletedCount(): Promise<number> {
    return 0;
  }

  async getFailedCount(): Promise<number> {
    return 0;
  }

  async getDelayedCount(): Promise<number> {
    return 0;
  }
}

// ============================================================================
// HTTP
// ============================================================================

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

export function startServer(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }

      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}

/**
 * Read a JSON response body as an unknown value for narrowing in assertions.
 */
export async function readJson(response: Response): Promise<unknown> {
  const body: unknown = await response.json();
  return body;
}
