/**
 * Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Logger, runWithLogContext } from '../../index.js';

const Entry = z.record(z.string(), z.unknown());

function capture(minSeverity: 'DEBUG' | 'WARNING' = 'DEBUG') {
  const lines: Array<Record<string, unknown>> = [];
  const logger = new Logger({
    serviceName: 'test',
    minSeverity,
    sink: (line) => lines.push(Entry.parse(JSON.parse(line))),
  });
  return { logger, lines };
}

describe('Logger', () => {
  it('writes structured entries with service and data', () => {
    const { logger, lines } = capture();
    logger.info('slice started', { attempts: 1 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ severity: 'INFO', message: 'slice started', service: 'test', attempts: 1 });
  });

  it('drops entries below the minimum severity', () => {
    const { logger, lines } = capture('WARNING');
    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud');
    expect(lines.map((l) => l.message)).toEqual(['loud']);
  });

  it('merges the async log context', async () => {
    const { logger, lines } = capture();
    await runWithLogContext({ moduleId: 'app', taskId: 'T-0001' }, async () => {
      await runWithLogContext({ sliceId: 'S-0001' }, async () => {
        logger.info('inside');
      });
    });
    expect(lines[0]).toMatchObject({ moduleId: 'app', taskId: 'T-0001', sliceId: 'S-0001' });
  });

  it('redacts secrets in messages and data', () => {
    const { logger, lines } = capture();
    logger.info('token Bearer test-secret-token', { header: 'password=test-secret' });
    expect(lines[0].message).toBe('token [REDACTED]');
    expect(lines[0].header).toBe('[REDACTED]');
  });

  it('formats errors', () => {
    const { logger, lines } = capture();
    logger.error('failed', new Error('boom'));
    expect(lines[0]).toMatchObject({ severity: 'ERROR', error: { message: 'boom' } });
  });

  it('child loggers add default fields', () => {
    const { logger, lines } = capture();
    logger.child({ component: 'verify' }).warn('x');
    expect(lines[0]).toMatchObject({ component: 'verify', severity: 'WARNING' });
  });
});
