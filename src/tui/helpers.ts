/**
 * Shared helper functions for the TUI layer
 */

import { sliceChars } from '../roles/template.js';
import type { RoleRecord } from '../types.js';
import type { RoleChoice } from './components/RolePicker.js';

export const PREVIEW_WIDTH = 48;

/** First non-empty line of a role body, cut to `width` with an ellipsis. */
export function previewLine(body: string, width: number = PREVIEW_WIDTH): string {
  const line = body.split(/\r\n|\r|\n/).find(l => l.trim()) ?? '';
  const trimmed = line.trim();
  if (Array.from(trimmed).length <= width) return trimmed;
  return `${sliceChars(trimmed, 0, width - 1)}…`;
}

/** Picker entries for persona roles preview their description, not the "You are" header. */
export function toRoleChoice(record: RoleRecord): RoleChoice {
  return { name: record.name, preview: previewLine(record.rawDescription) };
}
