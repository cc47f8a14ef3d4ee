/**
 * Yes/no confirmation
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';

interface ConfirmProps {
  title: string;
  lines?: string[];
  /** Highlights the prompt in red and defaults the answer to no. */
  danger?: boolean;
  onConfirm: () => void;
  onCancel: () => void;
}

export function Confirm({ title, lines = [], danger = false, onConfirm, onCancel }: ConfirmProps) {
  const [selected, setSelected] = useState<'yes' | 'no'>(danger ? 'no' : 'yes');

  useInput((input, key) => {
    if (input === 'y' || input === 'Y') {
      onConfirm();
      return;
    }
    if (input === 'n' || input === 'N' || key.escape) {
      onCancel();
      return;
    }
    if (key.leftArrow || key.rightArrow) {
      setSelected(selected === 'yes' ? 'no' : 'yes');
    }
    if (key.return) {
      if (selected === 'yes') {
        onConfirm();
      } else {
        onCancel();
      }
    }
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={danger ? 'red' : 'cyan'} paddingX={1} marginTop={1}>
      <Text bold color={danger ? 'red' : 'cyan'}>{title}</Text>
      {lines.map((line, i) => (
        <Text key={i} color="gray">{line}</Text>
      ))}
      <Box marginTop={1}>
        <Text>Continue? </Text>
        <Text color={selected === 'yes' ? 'green' : 'gray'} bold={selected === 'yes'}>
          [Y]es
        </Text>
        <Text> / </Text>
        <Text color={selected === 'no' ? 'red' : 'gray'} bold={selected === 'no'}>
          [N]o
        </Text>
      </Box>
    </Box>
  );
}
