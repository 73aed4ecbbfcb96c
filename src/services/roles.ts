/**
 * Role Manager
 *
 * Consumer-facing role operations. Wraps a store and the registry built
 * from it, asks for confirmation before destructive writes, and rebuilds
 * the registry whenever this process changes the stored roles.
 */

import { DEFAULT_ROLE_BY_KIND, selectDefaultRole } from '../default-roles.js';
import { RoleNotFoundError } from '../errors.js';
import { buildRoleRecord } from '../roles/template.js';
import type {
  Confirm,
  DefaultRoleFlags,
  OperationOutcome,
  RoleRecord,
  RoleStyle,
  TemplateVariables,
} from '../types.js';
import { buildRegistry } from './bootstrap.js';
import type { IRoleRegistry, IRoleStore } from './interfaces.js';

export interface CreateRoleOptions {
  style?: RoleStyle;
  variables?: TemplateVariables;
}

export interface RoleManagerOptions {
  store: IRoleStore;
  registry: IRoleRegistry;
  confirm: Confirm;
  defaultStyle?: RoleStyle;
}

export class RoleManager {
  private readonly store: IRoleStore;
  private readonly confirm: Confirm;
  private readonly defaultStyle: RoleStyle;
  private registry: IRoleRegistry;

  constructor(options: RoleManagerOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.confirm = options.confirm;
    this.defaultStyle = options.defaultStyle ?? 'persona';
  }

  /** Render and persist a role. Asks before replacing an existing one. */
  async create(name: string, description: string, options: CreateRoleOptions = {}): Promise<OperationOutcome<RoleRecord>> {
    // Render first so a missing variable fails before any prompt
    const record = buildRoleRecord({
      name,
      description,
      style: options.style ?? this.defaultStyle,
      variables: options.variables,
    });

    if (this.store.exists(name)) {
      const answer = await this.confirm(`Role "${name}" already exists, overwrite it?`);
      if (answer === 'cancelled') return { status: 'cancelled' };
    }

    this.store.save(record);
    this.refresh();
    return { status: 'done', value: record };
  }

  get(name: string): RoleRecord {
    return this.store.get(name);
  }

  /** Rendered instruction text of a role. */
  show(name: string): string {
    return this.store.get(name).renderedBody;
  }

  list(): string[] {
    return this.store.list();
  }

  /** Every stored role, oldest first. */
  records(): RoleRecord[] {
    return this.store.loadAll();
  }

  /** Asks before deleting. A missing role fails without prompting. */
  async delete(name: string): Promise<OperationOutcome<string>> {
    // Existence only: a file that no longer parses must still be removable
    if (!this.store.exists(name)) throw new RoleNotFoundError(name);

    const answer = await this.confirm(`Role "${name}" exist, delete it?`);
    if (answer === 'cancelled') return { status: 'cancelled' };

    this.store.delete(name);
    this.refresh();
    return { status: 'done', value: name };
  }

  resolve(message: string): string | null {
    return this.registry.resolve(message);
  }

  isSameRole(name: string, message: string): boolean {
    return this.registry.isSameRole(name, message);
  }

  /** Built-in role picked by flag priority. */
  getDefault(flags: DefaultRoleFlags): RoleRecord {
    return this.store.get(DEFAULT_ROLE_BY_KIND[selectDefaultRole(flags)].name);
  }

  getRegistry(): IRoleRegistry {
    return this.registry;
  }

  private refresh(): void {
    this.registry = buildRegistry(this.store);
  }
}
