// Recursive image discovery under a root directory, with folder-name exclusion

import path from 'node:path';
import fg from 'fast-glob';
import { isSupportedImage, type ImageList } from '../types/media.js';
import { recordEvent } from './eventLog.js';

/**
 * True when any folder between the scan root and the file is named in the
 * ignore set. Matching is exact and case-sensitive; the file name itself is
 * not considered.
 *
 * @param relativePath - Path relative to the scan root, either separator
 */
export function isIgnoredPath(relativePath: string, ignoreSet: ReadonlySet<string>): boolean {
  if (ignoreSet.size === 0) {
    return false;
  }
  const segments = relativePath.split(/[\\/]/).filter(segment => segment.length > 0);
  segments.pop();
  return segments.some(segment => ignoreSet.has(segment));
}

/**
 * Lists every supported image under `rootDir` as an absolute path, sorted by
 * plain string comparison.
 *
 * Unreadable subtrees are skipped rather than failing the whole scan.
 * Symbolic links are not followed.
 */
export async function scanImages(
  rootDir: string,
  ignoreSet: ReadonlySet<string>,
  ignoreEnabled: boolean
): Promise<ImageList> {
  const root = path.resolve(rootDir);

  const entries = await fg('**/*', {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    unique: true,
  });

  let ignoredCount = 0;
  const images = new Set<string>();
  for (const entry of entries) {
    if (!isSupportedImage(entry)) {
      continue;
    }
    if (ignoreEnabled && isIgnoredPath(entry, ignoreSet)) {
      ignoredCount++;
      continue;
    }
    images.add(path.join(root, entry));
  }

  const sorted = [...images].sort();
  recordEvent('image_scan_completed', {
    rootDir: root,
    found: sorted.length,
    ignored: ignoredCount,
    ignoreEnabled,
  }, 'debug');
  return sorted;
}

/**
 * Path of an image relative to the scan root, for display.
 */
export function toRelativePath(rootDir: string, imagePath: string): string {
  return path.relative(path.resolve(rootDir), imagePath);
}
