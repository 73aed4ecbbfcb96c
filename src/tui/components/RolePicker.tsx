/**
 * Role Picker Component
 *
 * Simple list picker over the stored roles.
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';

export interface RoleChoice {
  name: string;
  preview: string;
}

interface RolePickerProps {
  roles: RoleChoice[];
  onSelect: (role: RoleChoice) => void;
  onClose: () => void;
  maxHeight?: number;
}

export function RolePicker({ roles, onSelect, onClose, maxHeight = 20 }: RolePickerProps) {
  const [selectedIndex, setSelectedIndex] = useState(0);

  const titleLines = 2;
  const visibleRows = Math.max(3, maxHeight - titleLines);

  useInput((input, key) => {
    if (key.escape) {
      onClose();
      return;
    }

    if (key.upArrow) {
      setSelectedIndex(prev => Math.max(0, prev - 1));
      return;
    }

    if (key.downArrow) {
      setSelectedIndex(prev => Math.min(roles.length - 1, prev + 1));
      return;
    }

    if (key.return) {
      if (roles[selectedIndex]) onSelect(roles[selectedIndex]);
      return;
    }

    // Number keys for quick select (1-9)
    const num = parseInt(input, 10);
    if (num >= 1 && num <= Math.min(9, roles.length)) {
      onSelect(roles[num - 1]);
    }
  });

  if (roles.length === 0) {
    return (
      <Box paddingX={1}>
        <Text dimColor>No roles stored. Esc to close.</Text>
      </Box>
    );
  }

  // Keep the selection inside the visible window
  const offset = Math.max(0, selectedIndex - visibleRows + 1);
  const visibleRoles = roles.slice(offset, offset + visibleRows);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold color="cyan">Select role (1-{Math.min(9, roles.length)}, Enter, Esc cancel)</Text>
      <Box height={1} />

      {visibleRoles.map((role, i) => {
        const index = offset + i;
        const isSelected = index === selectedIndex;
        return (
          <Box key={role.name}>
            <Text color={isSelected ? 'cyan' : undefined}>
              {isSelected ? '> ' : '  '}
            </Text>
            <Text dimColor>{index + 1}. </Text>
            <Text color={isSelected ? 'cyan' : undefined} bold={isSelected}>
              {role.name}
            </Text>
            <Text dimColor>  {role.preview}</Text>
          </Box>
        );
      })}
    </Box>
  );
}
