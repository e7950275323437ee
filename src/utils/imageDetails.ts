// Loads what the terminal view shows for an image: name, format and file metadata

import path from 'node:path';
import fs from 'fs-extra';
import { determineImageFormat, type ImageDetails } from '../types/media.js';

/**
 * Reads the metadata of one image, verifying it is a readable regular file.
 *
 * @throws Error when the file is missing, unreadable, not a regular file or
 * no longer has a supported extension
 */
export async function loadImageDetails(rootDir: string, filePath: string): Promise<ImageDetails> {
  const format = determineImageFormat(filePath);
  if (!format) {
    throw new Error(`Unsupported image type: ${path.basename(filePath)}`);
  }

  const stats = await fs.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Not a regular file: ${path.basename(filePath)}`);
  }
  await fs.access(filePath, fs.constants.R_OK);

  return {
    filePath,
    fileName: path.basename(filePath),
    relativePath: path.relative(path.resolve(rootDir), filePath),
    format,
    sizeBytes: stats.size,
    dateModified: stats.mtimeMs,
  };
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}
