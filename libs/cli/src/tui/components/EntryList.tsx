/**
 * EntryList component - the visible window of filtered entries.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ViewModel } from '@quicklaunch/core';

interface EntryListProps {
  view: ViewModel;
}

function emptyMessage(view: ViewModel): string {
  if (view.total === 0) {
    return view.mode === 'template'
      ? 'No templates yet. Press Ctrl+N to create one.'
      : 'No commands yet. Press Ctrl+N to add one.';
  }
  return `No matches for '${view.query}'`;
}

export function EntryList({ view }: EntryListProps) {
  if (view.visibleEntries.length === 0) {
    return (
      <Box paddingX={1} marginTop={1}>
        <Text color="yellow">{emptyMessage(view)}</Text>
      </Box>
    );
  }

  const aliasWidth = Math.min(24, Math.max(...view.visibleEntries.map((e) => Array.from(e.alias).length)));

  return (
    <Box flexDirection="column" paddingX={1} marginTop={1}>
      {view.hiddenAbove > 0 && <Text color="gray">  ↑ {view.hiddenAbove} more</Text>}
      {view.visibleEntries.map((row) => {
        const number = row.hotkey === null ? '  ' : `${row.hotkey}.`;
        const alias = row.alias.padEnd(aliasWidth);
        return row.isSelected ? (
          <Text key={row.alias} bold color="whiteBright" backgroundColor="blue">
            {` ${number} ${row.icon} ${alias} → ${row.displayText} `}
          </Text>
        ) : (
          <Text key={row.alias}>
            <Text color="yellow">{` ${number}`}</Text> {row.icon} <Text color="cyan">{alias}</Text>
            <Text color="gray"> → </Text>{row.displayText}
          </Text>
        );
      })}
      {view.hiddenBelow > 0 && <Text color="gray">  ↓ {view.hiddenBelow} more</Text>}
    </Box>
  );
}
