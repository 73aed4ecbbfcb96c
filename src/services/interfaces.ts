/**
 * Service interfaces
 *
 * Abstractions for the role services, enabling dependency injection,
 * testing with fakes, and alternative storage backends.
 */

import type { PersistedRole, RoleRecord } from '../types.js';

/** Keyed role persistence. Never prompts. */
export interface IRoleStore {
  readonly root: string;

  save(record: RoleRecord): void;
  get(name: string): RoleRecord;
  list(): string[];
  exists(name: string): boolean;
  delete(name: string): void;
  readAll(): PersistedRole[];
  loadAll(): RoleRecord[];
}

/** Reverse lookup from rendered instruction text to role name. */
export interface IRoleRegistry {
  readonly size: number;

  resolve(message: string): string | null;
  isSameRole(name: string, message: string): boolean;
}
