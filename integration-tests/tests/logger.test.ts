/**
 * Structured Logger Tests
 */

import type { MockInstance } from 'vitest';
import {
  BaseFieldExtractor,
  logger,
  parseLogLevel,
  runWithContext,
  type Field,
} from '@claim-triage/core';

class UnreadableAssetExtractor extends BaseFieldExtractor<'assetDetails.assetId'> {
  readonly fieldPath = 'assetDetails.assetId';
  readonly description = 'Asset scanner that cannot read the page';
  readonly strategy = 'labeled_line';

  protected locate(): Field<string> {
    throw new Error('page unreadable');
  }
}

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let errorSpy: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('should write one JSON line with the claim context', () => {
    process.env.LOG_LEVEL = 'info';

    runWithContext({ correlationId: 'test-correlation', documentId: 'claim-1.txt' }, () => {
      logger.info('Claim routed', { route: 'Fast-track' });
    });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'INFO',
      correlationId: 'test-correlation',
      documentId: 'claim-1.txt',
      message: 'Claim routed',
      route: 'Fast-track',
    });
  });

  it('should drop messages below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';

    logger.info('not shown');
    logger.debug('not shown');
    logger.warn('shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should include error details', () => {
    process.env.LOG_LEVEL = 'error';

    logger.error('Claim processing failed', new Error('boom'));

    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'ERROR', error: { name: 'Error', message: 'boom' } });
  });

  it('should log a failing field extractor before rethrowing', () => {
    process.env.LOG_LEVEL = 'error';

    expect(() => new UnreadableAssetExtractor().extract('VIN: 1HGCM')).toThrow('page unreadable');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'ERROR',
      message: 'Field extraction failed',
      field_path: 'assetDetails.assetId',
      strategy: 'labeled_line',
      error: { message: 'page unreadable' },
    });
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
