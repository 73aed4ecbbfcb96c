/**
 * Application wiring
 *
 * Builds the role services for one process: resolve config, open the
 * store, seed the built-in roles, then build the registry once.
 */

import { resolveConfig } from './config.js';
import type { CliFlags } from './config.js';
import { bootstrapRoles } from './services/bootstrap.js';
import { detectPlatform } from './services/platform.js';
import { RoleStore } from './services/role-store.js';
import { RoleManager } from './services/roles.js';
import type { Confirm, PlatformDescriptors, TemplateVariables } from './types.js';

export interface OpenRolesOptions extends CliFlags {
  confirm: Confirm;
  platform?: PlatformDescriptors;
  configPath?: string;
}

export function openRoleManager(options: OpenRolesOptions): RoleManager {
  const config = resolveConfig({ storage: options.storage }, options.configPath);
  const store = new RoleStore(config.roleStoragePath);
  const registry = bootstrapRoles(store, options.platform ?? detectPlatform());

  return new RoleManager({
    store,
    registry,
    confirm: options.confirm,
    defaultStyle: config.defaultStyle,
  });
}

/** Parse repeated `key=value` arguments. Values may contain "=". */
export function parseVariableAssignments(pairs: string[]): { ok: true; variables: TemplateVariables } | { ok: false; error: string } {
  const variables: TemplateVariables = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      return { ok: false, error: `Invalid variable "${pair}". Format: key=value` };
    }
    variables[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return { ok: true, variables };
}
