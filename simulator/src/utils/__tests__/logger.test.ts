import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../logger.js';

describe('createLogger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it('prefixes lines with the scope and routes them by level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('debug');

    const log = createLogger('Playlist');
    log.debug('tick');
    log.info('started', 3);
    log.warn('short file');
    log.error('failed');

    expect(info.mock.calls).toEqual([['[Playlist] tick'], ['[Playlist] started', 3]]);
    expect(warn.mock.calls).toEqual([['[Playlist] short file']]);
    expect(error.mock.calls).toEqual([['[Playlist] failed']]);
  });

  it('drops messages below the current level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const log = createLogger('Simulation');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel', () => {
  it('accepts only the four levels', () => {
    expect(['debug', 'info', 'warn', 'error', 'trace', 'constructor'].map(isLogLevel)).toEqual([
      true, true, true, true, false, false,
    ]);
  });
});
