/**
 * Default role bootstrap
 *
 * Seeds the built-in roles into a store (never overwriting one that is
 * already there) and builds the registry from everything on disk.
 */

import { DEFAULT_ROLES } from '../default-roles.js';
import { buildRoleRecord } from '../roles/template.js';
import type { PlatformDescriptors } from '../types.js';
import type { IRoleStore } from './interfaces.js';
import { RoleRegistry } from './role-registry.js';

/** Write any missing built-in roles. Returns the names that were written. */
export function seedDefaultRoles(store: IRoleStore, platform: PlatformDescriptors): string[] {
  const variables = { os: platform.os, shell: platform.shell };
  const written: string[] = [];

  for (const template of DEFAULT_ROLES) {
    if (store.exists(template.name)) continue;

    store.save(buildRoleRecord({
      name: template.name,
      description: template.description,
      style: template.style,
      variables,
    }));
    written.push(template.name);
  }

  return written;
}

/** Build the registry from every role currently persisted, oldest first. */
export function buildRegistry(store: IRoleStore): RoleRegistry {
  return RoleRegistry.fromPersisted(store.readAll());
}

export function bootstrapRoles(store: IRoleStore, platform: PlatformDescriptors): RoleRegistry {
  const written = seedDefaultRoles(store, platform);
  if (written.length > 0) {
    console.debug('Seeded default roles:', written.join(', '));
  }
  return buildRegistry(store);
}
