import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { logError, logStructured } from '../server/logger.js';

describe('structured logging', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T09:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('writes one JSON line per event', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logStructured({ event: 'review.graded', source: 'review-service', data: { itemId: 'item-1' } });

    expect(consoleSpy).toHaveBeenCalledWith(
      '{"timestamp":"2026-03-01T09:00:00.000Z","level":"info","source":"review-service","event":"review.graded","data":{"itemId":"item-1"}}',
    );
  });

  it('drops events below the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const infoSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logStructured({ event: 'lessons.started' });
    logStructured({ event: 'progress.reset', level: 'warn' });

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('serialises errors with their stack', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('boom');

    logError(failure, 'api');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const [line] = errorSpy.mock.calls[0];
    expect(line).toContain('[api]');
    expect(line).toContain('Error: boom');
  });
});
