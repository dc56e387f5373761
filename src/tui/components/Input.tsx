import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import type { Phase } from '../app';

interface InputProps {
  onSubmit: (value: string) => void;
  isDisabled: boolean;
  phase: Phase;
}

const PLACEHOLDERS: Record<Phase, string> = {
  path: 'Path to a PDF document',
  indexing: 'Indexing...',
  ready: 'Type your question (quit to exit)'
};

export function Input({ onSubmit, isDisabled, phase }: InputProps) {
  const [value, setValue] = useState('');

  // Empty lines are submitted too; the app decides to re-prompt
  const handleSubmit = () => {
    if (!isDisabled) {
      onSubmit(value);
      setValue('');
    }
  };

  return (
    <Box borderStyle="single" borderTop={true} borderBottom={false} borderLeft={false} borderRight={false} paddingX={1}>
      <Text color="gray">{'> '}</Text>
      <TextInput
        value={value}
        onChange={setValue}
        onSubmit={handleSubmit}
        focus={!isDisabled}
        placeholder={isDisabled && phase === 'ready' ? 'Processing...' : PLACEHOLDERS[phase]}
      />
    </Box>
  );
}
