import React from 'react';
import { Box, Text } from 'ink';
import type { ImageLoadState } from '../hooks/useImageDetails.js';
import { formatFileSize } from '../utils/imageDetails.js';
import type { Rotation } from '../utils/playbackController.js';

interface ImageDisplayProps {
  load: ImageLoadState;
  rotation: Rotation;
  fullscreen: boolean;
}

const ROTATION_MARKERS: Record<Rotation, string> = {
  0: '↑',
  90: '→',
  180: '↓',
  270: '←',
};

const ImageDisplay: React.FC<ImageDisplayProps> = ({ load, rotation, fullscreen }) => {
  if (load.status === 'loading') {
    return (
      <Box flexGrow={1} paddingX={1}>
        <Text dimColor>Loading...</Text>
      </Box>
    );
  }

  if (load.status === 'error') {
    return (
      <Box flexGrow={1} flexDirection="column" paddingX={1}>
        <Text color="red">Error loading image {load.filePath}</Text>
        <Text dimColor>{load.errorMessage}</Text>
      </Box>
    );
  }

  const { details } = load;
  const modified = new Date(details.dateModified).toISOString().replace('T', ' ').slice(0, 19);

  return (
    <Box
      flexGrow={1}
      flexDirection="column"
      paddingX={1}
      justifyContent={fullscreen ? 'center' : 'flex-start'}
      alignItems={fullscreen ? 'center' : 'flex-start'}
    >
      <Text bold>{details.fileName}</Text>
      <Text dimColor>{details.filePath}</Text>
      <Text>
        {details.format} · {formatFileSize(details.sizeBytes)} · modified {modified} · {ROTATION_MARKERS[rotation]} {rotation}°
      </Text>
    </Box>
  );
};

export default ImageDisplay;
