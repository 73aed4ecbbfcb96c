/**
 * Built-in Role Definitions
 *
 * The four roles seeded into every role store. {os} and {shell} are
 * filled in from the current platform when the roles are first written.
 */

import type { DefaultRoleFlags, DefaultRoleKind, RoleStyle } from './types.js';

export interface DefaultRoleTemplate {
  id: DefaultRoleKind;
  name: string;
  style: RoleStyle;
  description: string;
}

export const SHELL_ROLE =
  'Provide only {shell} commands for {os} without any description.\n' +
  'If there is a lack of details, provide most logical solution.\n' +
  'Ensure the output is a valid shell command.\n' +
  'If multiple steps required try to combine them together using &&.\n' +
  'Provide only plain text without Markdown formatting.\n' +
  'Do not provide markdown formatting such as ```.\n';

// Output of any role containing "APPLY MARKDOWN" is rendered as Markdown
export const DESCRIBE_SHELL_ROLE =
  'Provide a terse, single sentence description of the given shell command.\n' +
  'Describe each argument and option of the command.\n' +
  'Provide short responses in about 80 words.\n' +
  'APPLY MARKDOWN formatting when possible.';

export const CODE_ROLE =
  'Provide only code as output without any description.\n' +
  'Provide only code in plain text format without Markdown formatting.\n' +
  'Do not include symbols such as ``` or ```python.\n' +
  'If there is a lack of details, provide most logical solution.\n' +
  'You are not allowed to ask for more details.\n' +
  'For example if the prompt is "Hello world Python", you should return "print(\'Hello world\')".';

export const DEFAULT_ROLE =
  'You are programming and system administration assistant.\n' +
  'You are managing {os} operating system with {shell} shell.\n' +
  'Provide short responses in about 100 words, unless you are specifically asked for more details.\n' +
  'If you need to store any data, assume it will be stored in the conversation.\n' +
  'APPLY MARKDOWN formatting when possible.';

export const DEFAULT_ROLES: DefaultRoleTemplate[] = [
  { id: 'default', name: 'ShellGPT', style: 'persona', description: DEFAULT_ROLE },
  { id: 'shell', name: 'Shell Command Generator', style: 'message', description: SHELL_ROLE },
  { id: 'describe-shell', name: 'Shell Command Descriptor', style: 'message', description: DESCRIBE_SHELL_ROLE },
  { id: 'code', name: 'Code Generator', style: 'message', description: CODE_ROLE },
];

/** Lookup built-in role template by kind */
export const DEFAULT_ROLE_BY_KIND = Object.fromEntries(
  DEFAULT_ROLES.map(r => [r.id, r]),
) as Record<DefaultRoleKind, DefaultRoleTemplate>;

/** Shell > DescribeShell > Code > Default */
export function selectDefaultRole(flags: DefaultRoleFlags): DefaultRoleKind {
  if (flags.shell) return 'shell';
  if (flags.describeShell) return 'describe-shell';
  if (flags.code) return 'code';
  return 'default';
}
