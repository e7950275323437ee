import React from 'react';
import { Box, Text } from 'ink';
import { SHORTCUTS } from '../utils/keyBindings.js';

const KeyboardShortcutsHelp: React.FC = () => {
  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold>Controls:</Text>
      {SHORTCUTS.map(group => (
        <Box key={group.category} flexDirection="column">
          {group.shortcuts.map(shortcut => (
            <Text key={shortcut.description}>
              {'  '}{shortcut.keys.join(' / ').padEnd(12)}{shortcut.description}
            </Text>
          ))}
        </Box>
      ))}
    </Box>
  );
};

export default KeyboardShortcutsHelp;
