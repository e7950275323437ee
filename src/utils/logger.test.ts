import { afterEach, describe, expect, it } from 'vitest';
import { isLogLevel, logger, setLogLevel } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('writes the event name and payload to the matching console method', () => {
    setLogLevel('info');
    const entry = logger.warn('state_load_failed', { filePath: '/data/state.json' });

    expect(entry).toMatchObject({ level: 'warn', event: 'state_load_failed' });
    expect(console.warn).toHaveBeenCalledWith(
      `${new Date(entry.timestamp).toISOString()} WARN  state_load_failed`,
      { filePath: '/data/state.json' }
    );
  });

  it('omits the payload argument when there is none', () => {
    setLogLevel('info');
    const entry = logger.info('slideshow_ready');

    expect(console.info).toHaveBeenCalledWith(`${new Date(entry.timestamp).toISOString()} INFO  slideshow_ready`);
  });

  it('drops entries below the minimum level but still returns them', () => {
    setLogLevel('warn');
    const entry = logger.debug('image_scan_completed', { found: 2 });

    expect(entry.level).toBe('debug');
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
