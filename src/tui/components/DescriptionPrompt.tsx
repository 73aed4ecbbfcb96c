/**
 * Description Prompt Component
 *
 * Free-text entry for a new role's description.
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';

interface DescriptionPromptProps {
  roleName: string;
  onSubmit: (description: string) => void;
  onCancel: () => void;
}

export function DescriptionPrompt({ roleName, onSubmit, onCancel }: DescriptionPromptProps) {
  const [value, setValue] = useState('');

  useInput((_input, key) => {
    if (key.escape) onCancel();
  });

  return (
    <Box flexDirection="column">
      <Text bold color="cyan">Enter role description for {roleName} (Enter to save, Esc cancel)</Text>
      <Box>
        <Text color="cyan">{'> '}</Text>
        <TextInput
          value={value}
          onChange={setValue}
          onSubmit={(submitted) => {
            // Empty input is ignored rather than saved
            if (submitted.trim()) onSubmit(submitted);
          }}
        />
      </Box>
    </Box>
  );
}
