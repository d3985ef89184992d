import { describe, it, expect, vi } from 'vitest';
import { createVerboseLogger, getLogger } from '../logger.js';

function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('getLogger', () => {
  it('returns a custom logger unchanged', () => {
    const logger = makeLogger();
    expect(getLogger(logger)).toBe(logger);
  });

  it('silences output when disabled', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    getLogger(false).warn('hidden');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it('defaults to console', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    getLogger(undefined).error('shown');
    expect(spy).toHaveBeenCalledWith('shown');
    spy.mockRestore();
  });
});

describe('createVerboseLogger', () => {
  it('drops debug and info unless verbose', () => {
    const base = makeLogger();
    const logger = createVerboseLogger(base);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(base.debug).not.toHaveBeenCalled();
    expect(base.info).not.toHaveBeenCalled();
    expect(base.warn).toHaveBeenCalledWith('w');
    expect(base.error).toHaveBeenCalledWith('e');
  });

  it('passes everything through when verbose', () => {
    const base = makeLogger();
    expect(createVerboseLogger(base, true)).toBe(base);
  });
});
