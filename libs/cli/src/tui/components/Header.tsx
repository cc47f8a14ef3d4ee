/**
 * Header component - title, mode tabs and match counts.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { NavigationMode } from '@quicklaunch/core';

interface HeaderProps {
  mode: NavigationMode;
  matched: number;
  total: number;
  totalUses: number;
}

const TABS: Array<[NavigationMode, string]> = [
  ['command', 'Commands'],
  ['template', 'Templates'],
];

export function Header({ mode, matched, total, totalUses }: HeaderProps) {
  return (
    <Box borderStyle="round" borderColor="cyan" paddingX={1} justifyContent="space-between">
      <Box>
        <Text bold color="cyan">⚡ QuickLaunch  </Text>
        {TABS.map(([tab, label]) => (
          <Text key={tab} color={tab === mode ? 'whiteBright' : 'gray'} bold={tab === mode} inverse={tab === mode}>
            {` ${label} `}
          </Text>
        ))}
      </Box>
      <Text color="gray">
        {matched === total ? `${total}` : `${matched}/${total}`} shown
        {totalUses > 0 ? ` • ${totalUses} uses` : ''}
      </Text>
    </Box>
  );
}
