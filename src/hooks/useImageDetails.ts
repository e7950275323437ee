import { useEffect, useState } from 'react';
import { loadImageDetails } from '../utils/imageDetails.js';
import type { ImageDetails } from '../types/media.js';

export type ImageLoadState =
  | { status: 'loading'; filePath: string }
  | { status: 'loaded'; filePath: string; details: ImageDetails }
  | { status: 'error'; filePath: string; errorMessage: string };

/**
 * Loads the displayed image's metadata. Results for a path that is no longer
 * current are dropped, so fast navigation never shows a stale image.
 */
export function useImageDetails(rootDir: string, filePath: string): ImageLoadState {
  const [state, setState] = useState<ImageLoadState>({ status: 'loading', filePath });

  useEffect(() => {
    let isCurrent = true;
    setState({ status: 'loading', filePath });

    loadImageDetails(rootDir, filePath).then(
      (details) => {
        if (isCurrent) {
          setState({ status: 'loaded', filePath, details });
        }
      },
      (error: unknown) => {
        if (isCurrent) {
          setState({
            status: 'error',
            filePath,
            errorMessage: error instanceof Error ? error.message : String(error),
          });
        }
      }
    );

    return () => {
      isCurrent = false;
    };
  }, [rootDir, filePath]);

  return state;
}
