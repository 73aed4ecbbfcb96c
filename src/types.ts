/**
 * Type definitions for rolecall
 */

/**
 * How a role's description becomes its stored instruction.
 * - persona: prefixed with "You are {name}" (self-identifying)
 * - message: stored unchanged, identified later by its key
 */
export type RoleStyle = 'persona' | 'message';

export type TemplateVariables = Record<string, string>;

export interface RoleRecord {
  name: string;
  // On a record read back from disk this is the substituted description:
  // placeholders are not stored, only the rendered body is
  rawDescription: string;
  renderedBody: string;
  identificationKey: string;
  variables?: TemplateVariables; // only used while rendering, never persisted
}

/** Legacy key shape: a phrase mapped to a role name. Read, never written. */
export interface KeyPhrase {
  phrase: string;
  name: string;
}

/** On-disk shape of <storage_root>/<name>.json */
export interface PersistedRole {
  name: string;
  role: string;
  message_to_role?: string | KeyPhrase | null;
}

export type ConfirmResult = 'proceed' | 'cancelled';

/** User confirmation capability. Declining is an outcome, not an error. */
export type Confirm = (prompt: string) => Promise<ConfirmResult>;

export type OperationOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'cancelled' };

export type DefaultRoleKind = 'default' | 'shell' | 'describe-shell' | 'code';

export interface DefaultRoleFlags {
  shell?: boolean;
  describeShell?: boolean;
  code?: boolean;
}

export interface PlatformDescriptors {
  os: string;
  shell: string;
}
