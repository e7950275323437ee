// Runtime configuration: everything downstream modules need, resolved once at startup

import os from 'node:os';
import path from 'node:path';
import { isLogLevel, type LogLevel } from './utils/logger.js';
import { DEFAULT_DELAY_SECONDS } from './utils/playbackController.js';
import { DEFAULT_QUIT_POLICY, type QuitAction, type QuitPolicy } from './types/state.js';

export const IGNORE_LIST_FILE_NAME = 'ignore_folders.json';
export const STATE_FILE_NAME = 'slideshow_state.json';
export const DATA_DIR_NAME = '.image-slideshow';

export interface CliOptions {
  directory: string;
  fullscreen?: boolean;
  delay?: number;
  continue?: boolean;
  startIndex?: number;
  ignore?: boolean;
  ignoreFile?: string;
  stateFile?: string;
  onQuit?: QuitAction;
  onEscape?: QuitAction;
  verbose?: boolean;
}

export interface SlideshowConfig {
  rootDir: string;
  fullscreen: boolean;
  delaySeconds: number;
  /** Load the saved position at startup and save it on exit. */
  resume: boolean;
  startIndex?: number;
  ignoreEnabled: boolean;
  ignoreListPath: string;
  statePath: string;
  quitPolicy: QuitPolicy;
  logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

export function resolveDataDir(env: Environment = process.env): string {
  const override = env.SLIDESHOW_HOME;
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), DATA_DIR_NAME);
}

export function resolveConfig(options: CliOptions, env: Environment = process.env): SlideshowConfig {
  const dataDir = resolveDataDir(env);
  const envLevel = env.SLIDESHOW_LOG_LEVEL;

  let logLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
  if (options.verbose) {
    logLevel = 'debug';
  }

  return {
    rootDir: path.resolve(options.directory),
    fullscreen: options.fullscreen ?? false,
    delaySeconds: options.delay ?? DEFAULT_DELAY_SECONDS,
    resume: options.continue ?? false,
    startIndex: options.startIndex,
    ignoreEnabled: options.ignore ?? true,
    ignoreListPath: options.ignoreFile
      ? path.resolve(options.ignoreFile)
      : path.join(dataDir, IGNORE_LIST_FILE_NAME),
    statePath: options.stateFile
      ? path.resolve(options.stateFile)
      : path.join(dataDir, STATE_FILE_NAME),
    quitPolicy: {
      ...DEFAULT_QUIT_POLICY,
      ...(options.onQuit ? { q: options.onQuit } : {}),
      ...(options.onEscape ? { escape: options.onEscape } : {}),
    },
    logLevel,
  };
}
