import React from 'react';
import { Box, Text } from 'ink';
import type { NavigationSnapshot } from '../utils/navigationController.js';

interface StatusBarProps {
  snapshot: NavigationSnapshot;
  relativePath: string;
}

export function formatStatusLine(snapshot: NavigationSnapshot, relativePath: string): string {
  const status = snapshot.autoPlay ? '▶ AUTO' : '⏸ MANUAL';
  return `${status} | ${snapshot.currentIndex + 1}/${snapshot.total} | ${relativePath}`;
}

export function formatPlaybackDetails(snapshot: NavigationSnapshot): string {
  const delay = snapshot.delaySeconds === 0 ? 'manual only' : `${snapshot.delaySeconds}s`;
  return `delay ${delay} | rotation ${snapshot.rotation}°`;
}

const StatusBar: React.FC<StatusBarProps> = ({ snapshot, relativePath }) => {
  return (
    <Box justifyContent="space-between" paddingX={1} borderStyle="single" borderColor="gray">
      <Text wrap="truncate-middle">{formatStatusLine(snapshot, relativePath)}</Text>
      <Text dimColor>{formatPlaybackDetails(snapshot)}</Text>
    </Box>
  );
};

export default StatusBar;
