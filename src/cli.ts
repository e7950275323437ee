// Command-line surface

import { Command, InvalidArgumentError, Option } from 'commander';
import type { CliOptions } from './config.js';
import { DEFAULT_DELAY_SECONDS, isValidDelay } from './utils/playbackController.js';
import type { QuitAction } from './types/state.js';

const QUIT_ACTIONS: QuitAction[] = ['save', 'discard'];

const EXAMPLES = `
Examples:
  $ image-slideshow ~/Pictures
  $ image-slideshow ~/Pictures --fullscreen --delay 5
  $ image-slideshow . --delay 0          (manual mode, current directory)
  $ image-slideshow ~/Pictures -c        (resume where you left off)`;

export function parseDelay(value: string): number {
  const delay = Number(value);
  if (value.trim() === '' || !isValidDelay(delay)) {
    throw new InvalidArgumentError('Delay must be an integer from 0 to 9.');
  }
  return delay;
}

/**
 * Only the format is checked here; the range depends on how many images
 * the scan finds and falls back to 0 with a warning.
 */
export function parseStartIndex(value: string): number {
  const index = Number(value);
  if (value.trim() === '' || !Number.isInteger(index)) {
    throw new InvalidArgumentError('Start index must be an integer.');
  }
  return index;
}

const isQuitAction = (value: unknown): value is QuitAction =>
  value === 'save' || value === 'discard';

export function createProgram(): Command {
  return new Command()
    .name('image-slideshow')
    .description('Image slideshow from a nested directory structure')
    .argument('[directory]', 'root directory to search for images', '.')
    .option('-f, --fullscreen', 'start in fullscreen mode', false)
    .option(
      '-d, --delay <seconds>',
      'delay between images in seconds (0 = manual only)',
      parseDelay,
      DEFAULT_DELAY_SECONDS
    )
    .option('-c, --continue', 'resume from the last viewed image and save the position on exit', false)
    .option('-s, --start-index <index>', 'start at this image index (0-based)', parseStartIndex)
    .option('--no-ignore', 'include images inside ignored folders')
    .option('--ignore-file <path>', 'ignore-list file (default: ~/.image-slideshow/ignore_folders.json)')
    .option('--state-file <path>', 'resume state file (default: ~/.image-slideshow/slideshow_state.json)')
    .addOption(
      new Option('--on-quit <action>', 'whether Q saves the position when resuming').choices(QUIT_ACTIONS)
    )
    .addOption(
      new Option('--on-escape <action>', 'whether Escape saves the position when resuming').choices(QUIT_ACTIONS)
    )
    .option('--verbose', 'enable debug logging', false)
    .addHelpText('after', EXAMPLES);
}

/**
 * @param argv - User arguments only (no node/script prefix)
 */
export function parseCliArgs(argv: readonly string[], program: Command = createProgram()): CliOptions {
  program.parse([...argv], { from: 'user' });
  const opts = program.opts();

  const options: CliOptions = {
    directory: program.args[0] ?? '.',
    fullscreen: opts.fullscreen === true,
    delay: typeof opts.delay === 'number' ? opts.delay : DEFAULT_DELAY_SECONDS,
    continue: opts.continue === true,
    ignore: opts.ignore !== false,
    verbose: opts.verbose === true,
  };

  if (typeof opts.startIndex === 'number') {
    options.startIndex = opts.startIndex;
  }
  if (typeof opts.ignoreFile === 'string') {
    options.ignoreFile = opts.ignoreFile;
  }
  if (typeof opts.stateFile === 'string') {
    options.stateFile = opts.stateFile;
  }
  if (isQuitAction(opts.onQuit)) {
    options.onQuit = opts.onQuit;
  }
  if (isQuitAction(opts.onEscape)) {
    options.onEscape = opts.onEscape;
  }

  return options;
}
