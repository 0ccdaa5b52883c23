import { afterEach, describe, expect, it, vi } from 'vitest';
import { configureCells, resetCellConfig } from './config.js';
import { createLogger, isLevelEnabled } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetCellConfig();
  });

  it('prefixes messages with the component', () => {
    configureCells({ logLevel: 'debug' });
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createLogger('Test').debug('hello', { a: 1 });

    expect(debug).toHaveBeenCalledWith('[Test] hello', { a: 1 });
  });

  it('omits the context argument when none is given', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('Test').warn('careful');
    expect(warn).toHaveBeenCalledWith('[Test] careful');
  });

  it('routes each level to its console method', () => {
    configureCells({ logLevel: 'debug' });
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});

    const log = createLogger('Levels');
    log.error('broken');
    log.info('fyi');

    expect(error).toHaveBeenCalledWith('[Levels] broken');
    expect(info).toHaveBeenCalledWith('[Levels] fyi');
  });

  it('drops messages below the configured level', () => {
    configureCells({ logLevel: 'warn' });
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});

    const log = createLogger('Quiet');
    log.debug('noise');
    log.info('noise');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(isLevelEnabled('info')).toBe(false);
    expect(isLevelEnabled('error')).toBe(true);
  });

  it('writes nothing when silent', () => {
    configureCells({ logLevel: 'silent' });
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('Silent').error('broken');
    expect(error).not.toHaveBeenCalled();
  });
});
