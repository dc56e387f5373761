import React from 'react';
import { Box, Text, useStdout } from 'ink';
import type { Message } from '../app';

interface ChatViewProps {
  messages: Message[];
}

export function ChatView({ messages }: ChatViewProps) {
  const { stdout } = useStdout();
  const terminalWidth = stdout?.columns || 80;

  return (
    <Box flexDirection="column" paddingX={1} paddingY={1}>
      {messages.map((msg, index) => {
        const borderColor = msg.role === 'user' ? 'cyan' : 'green';
        const title = `${msg.role === 'user' ? 'You' : 'Assistant'}:`;
        // Account for padding and the "╭─ " / "╮" corners
        const borderWidth = terminalWidth - 4;
        const borderAfterTitle = borderWidth - title.length - 4;

        return (
          <Box key={index} flexDirection="column" marginBottom={1}>
            <Box flexDirection="row" marginLeft={1}>
              <Text color={borderColor}>╭─ </Text>
              <Text color={borderColor} bold>{title}</Text>
              <Text color={borderColor}>{'─'.repeat(Math.max(1, borderAfterTitle))}</Text>
              <Text color={borderColor}>╮</Text>
            </Box>

            <Box
              borderLeft={true}
              borderRight={true}
              borderTop={false}
              borderBottom={false}
              borderStyle="single"
              borderColor={borderColor}
              flexDirection="column"
              paddingX={1}
              marginLeft={1}
              marginRight={1}
            >
              <Text color={msg.role === 'assistant' ? 'green' : undefined}>{msg.content}</Text>
              {msg.sources && (
                <Box marginTop={1}>
                  <Text color="gray">{msg.sources}</Text>
                </Box>
              )}
            </Box>

            <Box flexDirection="row" marginLeft={1}>
              <Text color={borderColor}>╰</Text>
              <Text color={borderColor}>{'─'.repeat(Math.max(1, borderWidth - 2))}</Text>
              <Text color={borderColor}>╯</Text>
            </Box>
          </Box>
        );
      })}
    </Box>
  );
}
