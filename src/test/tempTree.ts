import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';

/**
 * Creates a scratch directory holding the given relative files (empty
 * contents unless provided). Call `cleanup` in afterEach.
 */
export async function createTempTree(files: Record<string, string> | string[] = []) {
  const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'image-slideshow-')));
  const entries = Array.isArray(files)
    ? files.map((file): [string, string] => [file, ''])
    : Object.entries(files);

  for (const [relativePath, contents] of entries) {
    await fs.outputFile(path.join(root, relativePath), contents);
  }

  return {
    root,
    resolve: (...segments: string[]) => path.join(root, ...segments),
    cleanup: () => fs.remove(root),
  };
}
