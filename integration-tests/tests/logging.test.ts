/**
 * Logger and correlation context unit tests
 */

import {
  formatLogLine,
  getContext,
  isLevelEnabled,
  logger,
  runWithContext,
  runWithContextAsync,
  serializeError,
} from '@noi-extract/shared';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should honour LOG_LEVEL as a threshold', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');

    expect(isLevelEnabled('debug')).toBe(false);
    expect(isLevelEnabled('info')).toBe(false);
    expect(isLevelEnabled('warn')).toBe(true);
    expect(isLevelEnabled('error')).toBe(true);
  });

  it('should write enabled levels only', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.debug('Registered preprocessor');
    logger.info('Worker started');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
  });

  it('should stamp lines with the current document', () => {
    const line = runWithContext({ correlationId: 'corr-1', documentId: 'doc-1' }, () =>
      formatLogLine('warn', 'Pattern fallback used', { fields: 3 })
    );

    expect(JSON.parse(line)).toMatchObject({
      level: 'WARN',
      correlationId: 'corr-1',
      documentId: 'doc-1',
      message: 'Pattern fallback used',
      fields: 3,
    });
  });

  it('should keep error codes when serializing errors', () => {
    const error = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    expect(serializeError(error)).toMatchObject({ name: 'Error', message: 'socket hang up', code: 'ECONNRESET' });
    expect(serializeError('plain failure')).toBe('plain failure');
  });
});

describe('runWithContextAsync', () => {
  it('should inherit fields the inner context leaves out', async () => {
    const inner = await runWithContext({ correlationId: 'corr-1', documentId: 'doc-1' }, () =>
      runWithContextAsync({ correlationId: 'corr-2', documentRole: 'budget' }, async () => getContext())
    );

    expect(inner).toEqual({ correlationId: 'corr-2', documentId: 'doc-1', documentRole: 'budget' });
    expect(getContext()).toBeUndefined();
  });
});
