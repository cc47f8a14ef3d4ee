import React from 'react';
import { Box, Text } from 'ink';

interface QueryBarProps {
  query: string;
}

export function QueryBar({ query }: QueryBarProps) {
  return (
    <Box paddingX={1}>
      <Text color="green">&gt; </Text>
      {query === ''
        ? <Text color="gray" dimColor>type to filter</Text>
        : <Text>{query}<Text color="gray">█</Text></Text>}
    </Box>
  );
}
