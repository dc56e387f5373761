import React from 'react';
import { Box, Text } from 'ink';
import type { Phase } from '../app';

interface StatusBarProps {
  model: string;
  document: string | null;
  chunkCount: number;
  phase: Phase;
  isProcessing: boolean;
}

export function StatusBar({ model, document, chunkCount, phase, isProcessing }: StatusBarProps) {
  return (
    <Box borderStyle="single" borderTop={true} borderBottom={false} borderLeft={false} borderRight={false} paddingX={1}>
      <Text>
        <Text color="gray">Status: </Text>
        <Text color={phase === 'ready' ? 'green' : 'yellow'}>
          {phase === 'ready' ? '●' : '○'} {phase === 'indexing' ? 'Indexing' : phase === 'ready' ? 'Ready' : 'No document'}
        </Text>
        <Text color="gray"> | </Text>
        <Text color="blue">Model: {model}</Text>
        <Text color="gray"> | </Text>
        <Text color="yellow">Document: {document ?? 'none'}</Text>
        <Text color="gray"> | </Text>
        <Text color="cyan">Chunks: {chunkCount}</Text>
        {isProcessing && (
          <>
            <Text color="gray"> | </Text>
            <Text color="magenta">Processing...</Text>
          </>
        )}
      </Text>
    </Box>
  );
}
