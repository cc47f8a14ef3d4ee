/**
 * Notice component - outcome of the last action, shown above the list.
 */

import React from 'react';
import { Box, Text } from 'ink';

export type NoticeTone = 'success' | 'error' | 'info';

export interface NoticeMessage {
  tone: NoticeTone;
  text: string;
  details?: string[];
}

const STYLE: Record<NoticeTone, { icon: string; color: string }> = {
  success: { icon: '✓', color: 'green' },
  error: { icon: '✗', color: 'red' },
  info: { icon: '•', color: 'yellow' },
};

export function Notice({ notice }: { notice: NoticeMessage }) {
  const style = STYLE[notice.tone];
  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color={style.color} bold>
        {style.icon} {notice.text}
      </Text>
      {notice.details?.map((line, i) => (
        <Box key={i} marginLeft={2}>
          <Text color="gray">{line}</Text>
        </Box>
      ))}
    </Box>
  );
}
