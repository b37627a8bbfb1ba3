import { describe, it, expect, vi } from 'vitest';
import { Logger } from '../lib/logger.js';

describe('Logger', () => {
  it('drops messages below its level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new Logger('warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('WARN shown'));
  });

  it('carries child context into every message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = new Logger('debug', { service: 'demo.service' }).child({ component: 'runner' });
    logger.debug('measured', { attempt: 2 });

    expect(error).toHaveBeenCalledWith(
      expect.stringContaining('DEBUG measured {"service":"demo.service","component":"runner","attempt":2}')
    );
  });

  it('keeps diagnostics off stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = new Logger('debug');
    logger.debug('restart issued');
    logger.info('measuring');
    logger.error('journal gone');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(3);
    expect(error).toHaveBeenNthCalledWith(1, expect.stringContaining('DEBUG restart issued'));
    expect(error).toHaveBeenNthCalledWith(2, expect.stringContaining('INFO measuring'));
    expect(error).toHaveBeenNthCalledWith(3, expect.stringContaining('ERROR journal gone'));
  });
});
