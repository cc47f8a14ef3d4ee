import React from 'react';
import { Box, Text } from 'ink';
import { KEY_HINTS } from '../../keymap.js';

export function KeyHints() {
  return (
    <Box marginTop={1} paddingX={1}>
      {KEY_HINTS.map(([key, action]) => (
        <Box key={key} marginRight={2}>
          <Text color="cyan">{key}</Text>
          <Text color="gray" dimColor> {action}</Text>
        </Box>
      ))}
    </Box>
  );
}
