// Keyboard surface: maps terminal key presses to slideshow actions

import type { RotationDirection } from './playbackController.js';
import type { QuitTrigger } from '../types/state.js';

export type SlideshowAction =
  | { type: 'next' }
  | { type: 'previous' }
  | { type: 'toggleAutoplay' }
  | { type: 'setDelay'; seconds: number }
  | { type: 'rotate'; direction: RotationDirection }
  | { type: 'toggleFullscreen' }
  | { type: 'toggleHelp' }
  | { type: 'quit'; trigger: QuitTrigger };

/** The subset of Ink's key flags the bindings look at. */
export interface KeyState {
  leftArrow: boolean;
  rightArrow: boolean;
  escape: boolean;
  ctrl: boolean;
}

export interface ShortcutGroup {
  category: string;
  shortcuts: {
    keys: string[];
    description: string;
  }[];
}

export const SHORTCUTS: readonly ShortcutGroup[] = [
  {
    category: 'Navigation',
    shortcuts: [
      { keys: ['→'], description: 'Next image' },
      { keys: ['←'], description: 'Previous image' },
      { keys: ['Space'], description: 'Toggle auto-play' },
      { keys: ['0-9'], description: 'Set delay in seconds (0 = manual only)' },
    ],
  },
  {
    category: 'View',
    shortcuts: [
      { keys: [',', '.'], description: 'Rotate counter-clockwise / clockwise' },
      { keys: ['F'], description: 'Toggle fullscreen' },
      { keys: ['?'], description: 'Show/hide this help' },
    ],
  },
  {
    category: 'Exit',
    shortcuts: [
      { keys: ['Q', 'Esc'], description: 'Quit' },
      { keys: ['Ctrl+C'], description: 'Close' },
    ],
  },
];

export function resolveKeyAction(input: string, key: KeyState): SlideshowAction | null {
  if (key.ctrl && input === 'c') {
    return { type: 'quit', trigger: 'close' };
  }
  if (key.escape) {
    return { type: 'quit', trigger: 'escape' };
  }
  if (key.rightArrow) {
    return { type: 'next' };
  }
  if (key.leftArrow) {
    return { type: 'previous' };
  }
  if (key.ctrl) {
    return null;
  }

  switch (input) {
    case ' ':
      return { type: 'toggleAutoplay' };
    case ',':
      return { type: 'rotate', direction: 'counterclockwise' };
    case '.':
      return { type: 'rotate', direction: 'clockwise' };
    case 'f':
    case 'F':
      return { type: 'toggleFullscreen' };
    case 'q':
    case 'Q':
      return { type: 'quit', trigger: 'q' };
    case '?':
      return { type: 'toggleHelp' };
  }

  if (/^[0-9]$/.test(input)) {
    return { type: 'setDelay', seconds: Number(input) };
  }

  return null;
}
