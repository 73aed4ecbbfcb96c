/**
 * Role template rendering
 *
 * Turns a raw description (plus optional variables) into the instruction
 * text that is stored and later sent to a model, and derives the key used
 * to recognise message-style roles in transcripts.
 */

import { IDENTIFICATION_KEY_LENGTH, PERSONA_PREFIX } from '../constants.js';
import { MissingVariableError } from '../errors.js';
import type { RoleRecord, RoleStyle, TemplateVariables } from '../types.js';

// "{{" and "}}" are literal braces; "{name}" is a placeholder
const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{([^{}]*)\}/g;

/** Slice by code points so multi-byte characters are never split. */
export function sliceChars(text: string, start: number, end?: number): string {
  return Array.from(text).slice(start, end).join('');
}

/**
 * Replace every {placeholder} in the description.
 * Without a variable set the description is returned untouched.
 */
export function substituteVariables(description: string, variables?: TemplateVariables): string {
  if (!variables) return description;

  return description.replace(PLACEHOLDER_PATTERN, (token, key: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    const name = key ?? '';
    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      throw new MissingVariableError(name);
    }
    return variables[name];
  });
}

export function renderBody(name: string, description: string, style: RoleStyle): string {
  if (style === 'message') return description;
  return `${PERSONA_PREFIX}${name}\n${description}`;
}

export function identificationKey(description: string): string {
  return sliceChars(description, 0, IDENTIFICATION_KEY_LENGTH);
}

export interface BuildRoleOptions {
  name: string;
  description: string;
  style: RoleStyle;
  variables?: TemplateVariables;
}

/** Substitute, derive the key, then render. The key never sees the persona prefix. */
export function buildRoleRecord({ name, description, style, variables }: BuildRoleOptions): RoleRecord {
  const substituted = substituteVariables(description, variables);
  return {
    name,
    rawDescription: description,
    renderedBody: renderBody(name, substituted, style),
    identificationKey: identificationKey(substituted),
    variables,
  };
}
