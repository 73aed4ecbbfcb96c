/**
 * Interactive prompts
 *
 * Promise wrappers that mount an ink component, wait for the user's
 * answer, and unmount again.
 */

import React from 'react';
import { render } from 'ink';
import type { Confirm, ConfirmResult } from '../types.js';
import { ConfirmPrompt } from './components/ConfirmPrompt.js';
import { DescriptionPrompt } from './components/DescriptionPrompt.js';
import { RolePicker } from './components/RolePicker.js';
import type { RoleChoice } from './components/RolePicker.js';

export const confirmWithInk: Confirm = (prompt: string) =>
  new Promise<ConfirmResult>(resolve => {
    const instance = render(
      <ConfirmPrompt
        prompt={prompt}
        onAnswer={answer => {
          instance.unmount();
          resolve(answer);
        }}
      />,
    );
  });

/** Resolves to null when the user cancels. */
export function promptDescription(roleName: string): Promise<string | null> {
  return new Promise(resolve => {
    const instance = render(
      <DescriptionPrompt
        roleName={roleName}
        onSubmit={description => {
          instance.unmount();
          resolve(description);
        }}
        onCancel={() => {
          instance.unmount();
          resolve(null);
        }}
      />,
    );
  });
}

/** Resolves to null when the picker is closed without a choice. */
export function pickRole(roles: RoleChoice[]): Promise<RoleChoice | null> {
  return new Promise(resolve => {
    const instance = render(
      <RolePicker
        roles={roles}
        maxHeight={process.stdout.rows || 20}
        onSelect={role => {
          instance.unmount();
          resolve(role);
        }}
        onClose={() => {
          instance.unmount();
          resolve(null);
        }}
      />,
    );
  });
}
