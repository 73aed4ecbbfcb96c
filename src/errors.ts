/**
 * Error types raised by role operations.
 *
 * A declined confirmation is not an error: see OperationOutcome.
 */

export type RoleErrorCode = 'ROLE_NOT_FOUND' | 'MISSING_VARIABLE' | 'INVALID_ROLE_NAME';

export class RoleError extends Error {
  readonly code: RoleErrorCode;

  constructor(code: RoleErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class RoleNotFoundError extends RoleError {
  readonly roleName: string;

  constructor(roleName: string) {
    super('ROLE_NOT_FOUND', `Role "${roleName}" not found.`);
    this.roleName = roleName;
  }
}

export class MissingVariableError extends RoleError {
  readonly variable: string;

  constructor(variable: string) {
    super('MISSING_VARIABLE', `Missing value for template variable "{${variable}}".`);
    this.variable = variable;
  }
}

export class InvalidRoleNameError extends RoleError {
  constructor(roleName: string) {
    super('INVALID_ROLE_NAME', `Invalid role name: "${roleName}".`);
  }
}

export function isRoleError(err: unknown): err is RoleError {
  return err instanceof RoleError;
}
