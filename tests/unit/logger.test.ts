import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '@server/lib/logger';

// tests/setup.ts pins LOG_LEVEL to error before the logger is constructed
describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('forwards errors to pino with the context and a serialized error', () => {
    const error = vi.spyOn(logger.pino, 'error').mockImplementation(() => undefined);

    logger.error('Sale finalization failed', { saleId: 7 }, new Error('connection reset'));

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({
        saleId: 7,
        err: expect.objectContaining({ name: 'Error', message: 'connection reset' }),
      }),
      'Sale finalization failed',
    );
  });

  it('wraps non-Error values before logging them', () => {
    const error = vi.spyOn(logger.pino, 'error').mockImplementation(() => undefined);

    logger.error('Unexpected rejection', {}, 'socket hang up');

    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.objectContaining({ message: 'socket hang up' }) }),
      'Unexpected rejection',
    );
  });

  it('drops messages below the configured level', () => {
    const warn = vi.spyOn(logger.pino, 'warn').mockImplementation(() => undefined);
    const info = vi.spyOn(logger.pino, 'info').mockImplementation(() => undefined);

    logger.logSecurityEvent('invalid_api_key', { ipAddress: '127.0.0.1' });
    logger.logSaleEvent('finalized', { saleId: 1, total: '150.00' });

    expect(warn).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });
});
