/**
 * EntryForm component - create or edit an entry in place.
 *
 * Enter moves to the next field and submits from the last one. Up and down
 * move between fields, Esc cancels.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import type { FormError, FormField, FormValues } from '../form.js';

interface EntryFormProps {
  title: string;
  fields: FormField[];
  initial: FormValues;
  error: FormError | null;
  onSubmit: (values: FormValues) => void;
  onCancel: () => void;
}

const LABELS: Record<FormField, string> = {
  alias: 'Alias',
  command: 'Command',
  description: 'Description',
  tags: 'Tags',
  defaults: 'Defaults',
};

const HINTS: Partial<Record<FormField, string>> = {
  tags: 'comma separated',
  defaults: 'name=value, name=value',
};

export function EntryForm({ title, fields, initial, error, onSubmit, onCancel }: EntryFormProps) {
  const [values, setValues] = useState<FormValues>(initial);
  const [focus, setFocus] = useState(0);

  // Jump to the field the last save rejected.
  useEffect(() => {
    if (error?.field) {
      const index = fields.indexOf(error.field);
      if (index !== -1) setFocus(index);
    }
  }, [error]);

  useInput((_input, key) => {
    if (key.escape) {
      onCancel();
      return;
    }
    if (key.upArrow) setFocus((f) => Math.max(0, f - 1));
    if (key.downArrow) setFocus((f) => Math.min(fields.length - 1, f + 1));
  });

  const labelWidth = Math.max(...fields.map((f) => LABELS[f].length));

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} marginTop={1}>
      <Text bold color="cyan">{title}</Text>
      <Box flexDirection="column" marginTop={1}>
        {fields.map((field, i) => (
          <Box key={field}>
            <Text color={i === focus ? 'cyan' : 'gray'}>{i === focus ? '› ' : '  '}{LABELS[field].padEnd(labelWidth)}  </Text>
            <TextInput
              value={values[field]}
              focus={i === focus}
              showCursor={i === focus}
              placeholder={HINTS[field]}
              onChange={(v) => setValues((prev) => ({ ...prev, [field]: v }))}
              onSubmit={() => {
                if (i < fields.length - 1) {
                  setFocus(i + 1);
                } else {
                  onSubmit(values);
                }
              }}
            />
          </Box>
        ))}
      </Box>
      {error && (
        <Box marginTop={1}>
          <Text color="red">✗ {error.message}</Text>
        </Box>
      )}
      <Box marginTop={1}>
        <Text color="gray" dimColor>Enter next/save, ↑↓ move, Esc cancel</Text>
      </Box>
    </Box>
  );
}
