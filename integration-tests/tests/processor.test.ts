/**
 * parse_statement Processor Tests
 *
 * Runs the worker's job processor against a real engine with stand-in text
 * acquisition; no Redis involved.
 */

import {
  CHASE_PROFILE,
  FieldExtractionStrategy,
  StatementParsingEngine,
  StrategyRegistry,
  validateTaskResult,
  type StrategyResult,
} from '@statement-parser/shared';
import {
  createStatementProcessor,
  RetryableParseError,
  type StatementJob,
} from '../../services/worker-statement-parser/src/lib/processor';
import { FakeAcquisition, loadStatement } from './helpers';

const TASK_ID = '0b6a8f52-6c1e-4d3a-9f7b-2e4c6a8b0d1f';

class ExplodingStrategy extends FieldExtractionStrategy {
  extract(): StrategyResult {
    throw new Error('boom');
  }
}

function job(attemptsMade: number, attempts = 3): StatementJob {
  return {
    id: TASK_ID,
    data: {
      task_id: TASK_ID,
      document_base64: Buffer.from('%PDF-1.4 fake').toString('base64'),
      filename: 'december.pdf',
      created_at: '2026-01-05T10:00:00.000Z',
    },
    attemptsMade,
    opts: { attempts },
  };
}

function explodingEngine(): StatementParsingEngine {
  const registry = new StrategyRegistry();
  registry.register(new ExplodingStrategy(CHASE_PROFILE, { proximityWindow: 150 }));
  return new StatementParsingEngine({
    acquisition: new FakeAcquisition(loadStatement('chase')),
    registry,
  });
}

describe('processParseStatement', () => {
  it('returns a SUCCESS result for a parseable statement', async () => {
    const acquisition = new FakeAcquisition(loadStatement('amex'));
    const processJob = createStatementProcessor(new StatementParsingEngine({ acquisition }));

    const result = await processJob(job(0));

    expect(Buffer.from(acquisition.nativeCalls[0] ?? []).toString()).toBe('%PDF-1.4 fake');
    expect(result.task_id).toBe(TASK_ID);
    expect(result.status).toBe('SUCCESS');
    expect(result.provider_identified).toBe('Amex');
    expect(result.data?.card_last_4_digits).toBe('1001');
    expect(result.created_at).toBe('2026-01-05T10:00:00.000Z');
    expect(validateTaskResult(result).valid).toBe(true);
  });

  it('returns document failures without retrying', async () => {
    const processJob = createStatementProcessor(
      new StatementParsingEngine({ acquisition: new FakeAcquisition('Discover statement') })
    );

    const result = await processJob(job(0));

    expect(result.status).toBe('FAILED');
    expect(result.error_kind).toBe('ProviderNotIdentifiedError');
    expect(result.error).toBe(
      'Could not identify credit card provider. Supported providers: Amex, Chase, Citi, Capital One, Bank of America'
    );
  });

  it('throws unexpected failures back to the queue while attempts remain', async () => {
    const processJob = createStatementProcessor(explodingEngine());

    await expect(processJob(job(0))).rejects.toBeInstanceOf(RetryableParseError);
    await expect(processJob(job(1))).rejects.toThrow('Unexpected parsing error: boom');
  });

  it('gives up on the last attempt', async () => {
    const processJob = createStatementProcessor(explodingEngine());

    const result = await processJob(job(2));

    expect(result.status).toBe('FAILED');
    expect(result.error_kind).toBe('UnexpectedError');
    expect(result.error).toBe('Max retries exceeded. Last error: Unexpected parsing error: boom');
    expect(validateTaskResult(result).valid).toBe(true);
  });

  it('treats a job without retry options as a single attempt', async () => {
    const processJob = createStatementProcessor(explodingEngine());
    const singleAttempt: StatementJob = { ...job(0), opts: {} };

    const result = await processJob(singleAttempt);

    expect(result.status).toBe('FAILED');
    expect(result.error_kind).toBe('UnexpectedError');
  });
});
