#!/usr/bin/env node
import React from 'react';
import chalk from 'chalk';
import { render } from 'ink';
import App from './App.js';
import { parseCliArgs } from './cli.js';
import { resolveConfig } from './config.js';
import type { NoticeInput } from './hooks/useNotices.js';
import { prepareSession } from './slideshow.js';
import { SlideshowStartupError } from './utils/errors.js';
import { errorMessageOf, recordEvent } from './utils/eventLog.js';
import { setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const config = resolveConfig(options);
  setLogLevel(config.logLevel);

  // Problems found before the view exists are shown once it mounts
  const startupNotices: NoticeInput[] = [];
  const session = await prepareSession(config, {
    showInfo: message => startupNotices.push({ message, type: 'info' }),
    showWarning: message => startupNotices.push({ message, type: 'warning' }),
    showError: message => startupNotices.push({ message, type: 'error' }),
  });

  const instance = render(<App session={session} initialNotices={startupNotices} />, {
    exitOnCtrlC: false,
  });

  const onSignal = (): void => {
    session.finish('close').then(
      () => instance.unmount(),
      (error: unknown) => {
        recordEvent('session_finish_failed', { trigger: 'close', errorMessage: errorMessageOf(error) }, 'error');
        instance.unmount();
      }
    );
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGHUP', onSignal);

  try {
    await instance.waitUntilExit();
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGHUP', onSignal);
  }
  // No-op when a quit key already finished the session
  await session.finish('close');
}

main().catch((error: unknown) => {
  if (error instanceof SlideshowStartupError) {
    console.error(chalk.red(`Error: ${error.message}`));
    process.exitCode = error.exitCode;
    return;
  }
  console.error(chalk.red(`Unexpected error: ${errorMessageOf(error)}`));
  process.exitCode = 1;
});
