/**
 * DryRunView component - what would run, without running it.
 */

import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { ExecutionPlan } from '@quicklaunch/core';

interface DryRunViewProps {
  alias: string;
  plan: ExecutionPlan;
  onBack: () => void;
}

export function DryRunView({ alias, plan, onBack }: DryRunViewProps) {
  useInput((_input, key) => {
    if (key.return || key.escape) onBack();
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1} marginTop={1}>
      <Text bold color="yellow">Dry run: {alias}</Text>
      <Text color="gray">Nothing will be executed.</Text>
      <Box flexDirection="column" marginTop={1}>
        {plan.segments.map((segment, i) => (
          <Text key={i}>
            <Text color="cyan">{plan.segments.length > 1 ? `${i + 1}. ` : '$ '}</Text>
            {segment}
          </Text>
        ))}
      </Box>
      {plan.warnings.map((warning) => (
        <Box key={warning.id} flexDirection="column" marginTop={1}>
          <Text color="yellow">⚠ {warning.message}</Text>
          {warning.suggestions?.map((s) => (
            <Text key={s} color="cyan">  {s}</Text>
          ))}
        </Box>
      ))}
      <Box marginTop={1}>
        <Text color="gray" dimColor>Enter or Esc to go back</Text>
      </Box>
    </Box>
  );
}
