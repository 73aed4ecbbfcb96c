/**
 * Role Store
 *
 * One JSON file per role under the storage root: <root>/<name>.json.
 * All I/O is synchronous. The store never prompts; callers confirm
 * overwrites and deletions before calling save() or delete().
 */

import * as fs from 'fs';
import * as path from 'path';
import { PERSONA_PREFIX, ROLE_FILE_EXTENSION } from '../constants.js';
import { InvalidRoleNameError, RoleNotFoundError } from '../errors.js';
import type { KeyPhrase, PersistedRole, RoleRecord } from '../types.js';
import type { IRoleStore } from './interfaces.js';

/** Validate that a role name is safe for use as a file name. */
export function isValidRoleName(name: string): boolean {
  return name.length > 0
    && !/[/\\\0]/.test(name)
    && name !== '.'
    && !name.includes('..');
}

function toPersisted(record: RoleRecord): PersistedRole {
  return {
    name: record.name,
    role: record.renderedBody,
    message_to_role: record.identificationKey,
  };
}

function keyOf(persisted: PersistedRole): string {
  const key = persisted.message_to_role ?? null;
  if (!key) return '';
  return typeof key === 'string' ? key : key.phrase;
}

function isKeyField(value: unknown): value is string | KeyPhrase | null {
  if (value === null || typeof value === 'string') return true;
  return typeof value === 'object'
    && 'phrase' in value && typeof value.phrase === 'string'
    && 'name' in value && typeof value.name === 'string';
}

function isPersistedRole(value: unknown): value is PersistedRole {
  return typeof value === 'object' && value !== null
    && 'name' in value && typeof value.name === 'string'
    && 'role' in value && typeof value.role === 'string'
    && (!('message_to_role' in value) || isKeyField(value.message_to_role));
}

/**
 * Rebuild a record from disk. Variables are never stored, so rawDescription
 * is the description after substitution.
 */
export function fromPersisted(persisted: PersistedRole): RoleRecord {
  const personaHeader = `${PERSONA_PREFIX}${persisted.name}\n`;
  const rawDescription = persisted.role.startsWith(personaHeader)
    ? persisted.role.slice(personaHeader.length)
    : persisted.role;

  return {
    name: persisted.name,
    rawDescription,
    renderedBody: persisted.role,
    identificationKey: keyOf(persisted),
  };
}

export class RoleStore implements IRoleStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  private ensureRoot(): void {
    if (!fs.existsSync(this.root)) {
      fs.mkdirSync(this.root, { recursive: true });
    }
  }

  filePath(name: string): string {
    if (!isValidRoleName(name)) throw new InvalidRoleNameError(name);
    return path.join(this.root, `${name}${ROLE_FILE_EXTENSION}`);
  }

  exists(name: string): boolean {
    return fs.existsSync(this.filePath(name));
  }

  /** Write the full record in a single call. Overwrites without asking. */
  save(record: RoleRecord): void {
    const filePath = this.filePath(record.name);
    this.ensureRoot();
    fs.writeFileSync(filePath, JSON.stringify(toPersisted(record)), 'utf-8');
  }

  get(name: string): RoleRecord {
    const filePath = this.filePath(name);
    if (!fs.existsSync(filePath)) throw new RoleNotFoundError(name);

    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isPersistedRole(parsed)) {
      throw new Error(`Role file is malformed: ${filePath}`);
    }
    return fromPersisted(parsed);
  }

  /** Role file paths, oldest modification first. Equal mtimes sort by file name. */
  list(): string[] {
    if (!fs.existsSync(this.root)) return [];

    return fs.readdirSync(this.root)
      .filter(file => file.endsWith(ROLE_FILE_EXTENSION))
      .map(file => {
        const filePath = path.join(this.root, file);
        return { file, filePath, stat: fs.statSync(filePath) };
      })
      .filter(entry => entry.stat.isFile())
      .sort((a, b) => a.stat.mtimeMs - b.stat.mtimeMs || (a.file < b.file ? -1 : a.file > b.file ? 1 : 0))
      .map(entry => entry.filePath);
  }

  /** Every readable persisted role in list() order. Unreadable files are skipped. */
  readAll(): PersistedRole[] {
    const roles: PersistedRole[] = [];
    for (const filePath of this.list()) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        if (isPersistedRole(parsed)) {
          roles.push(parsed);
        } else {
          console.debug('Skipping malformed role file:', filePath);
        }
      } catch (err) {
        console.debug('Skipping corrupted role file:', filePath, err);
      }
    }
    return roles;
  }

  loadAll(): RoleRecord[] {
    return this.readAll().map(fromPersisted);
  }

  delete(name: string): void {
    const filePath = this.filePath(name);
    if (!fs.existsSync(filePath)) throw new RoleNotFoundError(name);
    fs.unlinkSync(filePath);
  }
}
