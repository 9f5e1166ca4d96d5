import { describe, it, expect, vi, afterEach } from 'vitest';
import { describeError, logger, performanceLogger } from '../src/index.js';

describe('performanceLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs the label with the caller meta and a rounded duration', () => {
    const info = vi.spyOn(logger, 'info').mockReturnValue(logger);

    const duration = performanceLogger.startTimer('QA request').end({ roomId: 'C1', success: true });

    expect(duration).toBeGreaterThanOrEqual(0);
    expect(info).toHaveBeenCalledWith('QA request completed', {
      roomId: 'C1',
      success: true,
      duration: Math.round(duration),
    });
  });
});

describe('describeError', () => {
  it('keeps the message and stack of an Error', () => {
    const error = new Error('disk full');
    expect(describeError(error)).toEqual({ error: 'disk full', stack: error.stack });
  });

  it('stringifies anything else', () => {
    expect(describeError('plain string')).toEqual({ error: 'plain string' });
  });
});
