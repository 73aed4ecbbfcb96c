/**
 * Confirm Prompt Component
 *
 * Single-key yes/no question. Anything but "y" declines.
 */

import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { ConfirmResult } from '../../types.js';

interface ConfirmPromptProps {
  prompt: string;
  onAnswer: (answer: ConfirmResult) => void;
}

export function ConfirmPrompt({ prompt, onAnswer }: ConfirmPromptProps) {
  useInput((input, key) => {
    if (input.toLowerCase() === 'y') {
      onAnswer('proceed');
      return;
    }

    if (key.escape || key.return || input.toLowerCase() === 'n') {
      onAnswer('cancelled');
    }
  });

  return (
    <Box>
      <Text bold color="yellow">{prompt}</Text>
      <Text dimColor> [y/N]</Text>
    </Box>
  );
}
