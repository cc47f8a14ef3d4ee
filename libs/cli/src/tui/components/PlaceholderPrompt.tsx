/**
 * PlaceholderPrompt component - asks for one template value.
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import type { PlaceholderRequest } from '@quicklaunch/core';

interface PlaceholderPromptProps {
  alias: string;
  command: string;
  request: PlaceholderRequest;
  onSubmit: (value: string) => void;
  onCancel: () => void;
}

export function PlaceholderPrompt({ alias, command, request, onSubmit, onCancel }: PlaceholderPromptProps) {
  const [value, setValue] = useState('');

  useInput((_input, key) => {
    if (key.escape) onCancel();
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="magenta" paddingX={1} marginTop={1}>
      <Text bold color="magenta">🎨 {alias}</Text>
      <Text color="gray">{command}</Text>
      <Box marginTop={1}>
        <Text color="gray">({request.index + 1}/{request.total}) </Text>
        <Text bold>{request.name}</Text>
        {request.default !== undefined && <Text color="gray"> [{request.default}]</Text>}
        <Text>: </Text>
        <TextInput
          value={value}
          onChange={setValue}
          onSubmit={(v) => {
            setValue('');
            onSubmit(v);
          }}
        />
      </Box>
      {request.retry && <Text color="yellow">A value is required.</Text>}
      <Text color="gray" dimColor>Enter to confirm, Esc to cancel</Text>
    </Box>
  );
}
