import React, { useCallback, useEffect, useRef, useState } from 'react';
import { Box, useApp, useInput } from 'ink';
import ImageDisplay from './components/ImageDisplay.js';
import KeyboardShortcutsHelp from './components/KeyboardShortcutsHelp.js';
import NoticeBar from './components/NoticeBar.js';
import StatusBar from './components/StatusBar.js';
import { useImageDetails } from './hooks/useImageDetails.js';
import { useNotices, type NoticeInput } from './hooks/useNotices.js';
import { useSlideshow } from './hooks/useSlideshow.js';
import { useTerminalSize } from './hooks/useTerminalSize.js';
import type { SlideshowSession } from './slideshow.js';
import { errorMessageOf, recordEvent } from './utils/eventLog.js';
import { toRelativePath } from './utils/imageLocator.js';
import { resolveKeyAction, type SlideshowAction } from './utils/keyBindings.js';
import { PlaybackErrorPolicy } from './utils/playbackErrorPolicy.js';
import type { QuitTrigger } from './types/state.js';

export const UNREADABLE_STREAK_MESSAGE = 'None of the remaining images could be read.';

interface AppProps {
  session: SlideshowSession;
  initialNotices?: readonly NoticeInput[];
}

const App: React.FC<AppProps> = ({ session, initialNotices = [] }) => {
  const { exit } = useApp();
  const { controller, config } = session;
  const snapshot = useSlideshow(controller);
  const load = useImageDetails(config.rootDir, snapshot.currentPath);
  const { rows } = useTerminalSize();
  const { notices, showError, showInfo } = useNotices(initialNotices);

  const [isFullscreen, setIsFullscreen] = useState(config.fullscreen);
  const [showHelp, setShowHelp] = useState(true);
  const isQuittingRef = useRef(false);
  const errorPolicyRef = useRef(new PlaybackErrorPolicy(session.images.length));

  // Unreadable images are skipped, not fatal
  useEffect(() => {
    if (load.status === 'loaded') {
      errorPolicyRef.current.resetOnSuccess();
      return;
    }
    if (load.status !== 'error') {
      return;
    }

    const decision = errorPolicyRef.current.recordFailure();
    recordEvent('image_load_failed', {
      filePath: load.filePath,
      errorMessage: load.errorMessage,
      consecutiveFailures: decision.consecutiveFailures,
      reason: decision.reason,
    }, 'error');

    if (decision.shouldSkip) {
      controller.next();
    } else if (decision.reason === 'max_consecutive_failures') {
      showError(UNREADABLE_STREAK_MESSAGE);
    }
  }, [load, controller, showError]);

  const quit = useCallback((trigger: QuitTrigger) => {
    if (isQuittingRef.current) {
      return;
    }
    isQuittingRef.current = true;

    session.finish(trigger).then(
      (saved) => {
        if (saved) {
          showInfo('Position saved.');
        }
        exit();
      },
      (error: unknown) => {
        recordEvent('session_finish_failed', { trigger, errorMessage: errorMessageOf(error) }, 'error');
        exit(error instanceof Error ? error : new Error(String(error)));
      }
    );
  }, [session, exit, showInfo]);

  const dispatch = useCallback((action: SlideshowAction) => {
    switch (action.type) {
      case 'next':
        controller.next();
        break;
      case 'previous':
        controller.previous();
        break;
      case 'toggleAutoplay':
        controller.toggleAutoplay();
        break;
      case 'setDelay':
        controller.setDelay(action.seconds);
        break;
      case 'rotate':
        controller.rotate(action.direction);
        break;
      case 'toggleFullscreen':
        setIsFullscreen(prev => !prev);
        break;
      case 'toggleHelp':
        setShowHelp(prev => !prev);
        break;
      case 'quit':
        quit(action.trigger);
        break;
    }
  }, [controller, quit]);

  useInput((input, key) => {
    const action = resolveKeyAction(input, key);
    if (action && !isQuittingRef.current) {
      dispatch(action);
    }
  });

  return (
    <Box flexDirection="column" height={isFullscreen ? rows : undefined}>
      <ImageDisplay load={load} rotation={snapshot.rotation} fullscreen={isFullscreen} />
      <StatusBar
        snapshot={snapshot}
        relativePath={toRelativePath(config.rootDir, snapshot.currentPath)}
      />
      <NoticeBar notices={notices} />
      {showHelp && !isFullscreen && <KeyboardShortcutsHelp />}
    </Box>
  );
};

export default App;
