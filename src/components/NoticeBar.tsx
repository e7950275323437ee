import React from 'react';
import { Box, Text } from 'ink';
import type { Notice, NoticeType } from '../hooks/useNotices.js';

interface NoticeBarProps {
  notices: readonly Notice[];
}

const NOTICE_COLORS: Record<NoticeType, string> = {
  info: 'cyan',
  warning: 'yellow',
  error: 'red',
};

const NoticeBar: React.FC<NoticeBarProps> = ({ notices }) => {
  if (notices.length === 0) return null;

  return (
    <Box flexDirection="column" paddingX={1}>
      {notices.map(notice => (
        <Text key={notice.id} color={NOTICE_COLORS[notice.type]}>
          {notice.message}
        </Text>
      ))}
    </Box>
  );
};

export default NoticeBar;
