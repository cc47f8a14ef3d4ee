/**
 * Preview component - details of the selected entry.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { PreviewLine } from '@quicklaunch/core';

interface PreviewProps {
  lines: PreviewLine[];
}

export function Preview({ lines }: PreviewProps) {
  const labelWidth = Math.max(...lines.map((l) => l.label.length));

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1} marginTop={1}>
      {lines.map((line, i) => (
        <Text key={`${line.label}-${i}`} color={line.label === 'Warning' ? 'yellow' : undefined}>
          <Text color={line.label === 'Warning' ? 'yellow' : 'gray'}>{line.label.padEnd(labelWidth)}  </Text>
          {line.value}
        </Text>
      ))}
    </Box>
  );
}
