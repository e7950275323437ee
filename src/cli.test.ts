import { describe, expect, it } from 'vitest';
import { createProgram, parseCliArgs, parseDelay, parseStartIndex } from './cli.js';

const quietProgram = () =>
  createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs([], quietProgram())).toEqual({
      directory: '.',
      fullscreen: false,
      delay: 3,
      continue: false,
      ignore: true,
      verbose: false,
    });
  });

  it('reads every option', () => {
    const options = parseCliArgs(
      [
        'photos',
        '-f',
        '-d', '5',
        '-c',
        '-s', '7',
        '--no-ignore',
        '--ignore-file', 'ignore.json',
        '--state-file', 'state.json',
        '--on-quit', 'discard',
        '--on-escape', 'save',
        '--verbose',
      ],
      quietProgram()
    );

    expect(options).toEqual({
      directory: 'photos',
      fullscreen: true,
      delay: 5,
      continue: true,
      startIndex: 7,
      ignore: false,
      ignoreFile: 'ignore.json',
      stateFile: 'state.json',
      onQuit: 'discard',
      onEscape: 'save',
      verbose: true,
    });
  });

  it('accepts the long option names', () => {
    const options = parseCliArgs(['--fullscreen', '--delay', '0', '--continue', '--start-index', '2'], quietProgram());
    expect(options.fullscreen).toBe(true);
    expect(options.delay).toBe(0);
    expect(options.continue).toBe(true);
    expect(options.startIndex).toBe(2);
  });

  it('rejects a delay outside 0-9', () => {
    expect(() => parseCliArgs(['-d', '12'], quietProgram())).toThrow('Delay must be an integer from 0 to 9.');
  });

  it('rejects an unknown quit action', () => {
    expect(() => parseCliArgs(['--on-quit', 'maybe'], quietProgram())).toThrow('Allowed choices are save, discard');
  });
});

describe('argument parsers', () => {
  it('parses delays', () => {
    expect(parseDelay('9')).toBe(9);
    expect(() => parseDelay('')).toThrow('Delay must be an integer from 0 to 9.');
    expect(() => parseDelay('1.5')).toThrow('Delay must be an integer from 0 to 9.');
  });

  it('parses start indices without range checks', () => {
    expect(parseStartIndex('40')).toBe(40);
    expect(parseStartIndex('-1')).toBe(-1);
    expect(() => parseStartIndex('first')).toThrow('Start index must be an integer.');
  });
});
