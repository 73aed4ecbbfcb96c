/**
 * Role Registry
 *
 * Maps rendered instruction text back to the role that produced it.
 * Built once from the persisted roles and read-only afterwards; rebuild
 * it with RoleRegistry.fromPersisted() after roles change.
 *
 * Resolution looks at the first line only:
 *   1. "You are <name>" anywhere in the line names the role directly.
 *   2. Otherwise characters [8, 27) of the line (past a fixed-width speaker
 *      tag like "system: ") are matched against stored identification keys.
 */

import {
  FALLBACK_WINDOW_END,
  FALLBACK_WINDOW_START,
  PERSONA_PREFIX,
} from '../constants.js';
import { sliceChars } from '../roles/template.js';
import type { PersistedRole, RoleRecord } from '../types.js';
import type { IRoleRegistry } from './interfaces.js';

const WINDOW_LENGTH = FALLBACK_WINDOW_END - FALLBACK_WINDOW_START;

export interface KeyEntry {
  key: string;
  name: string;
}

/** Keys are compared over the window length; the stored key may be one character longer. */
function windowOf(key: string): string {
  return sliceChars(key, 0, WINDOW_LENGTH);
}

function firstLine(message: string): string {
  return message.split(/\r\n|\r|\n/, 1)[0] ?? '';
}

export class RoleRegistry implements IRoleRegistry {
  private readonly keyToName: ReadonlyMap<string, string>;

  /** Later entries shadow earlier ones with the same key. */
  constructor(entries: Iterable<KeyEntry>) {
    const map = new Map<string, string>();
    for (const { key, name } of entries) {
      if (!key) continue;
      map.set(windowOf(key), name);
    }
    this.keyToName = map;
  }

  static fromRecords(records: RoleRecord[]): RoleRegistry {
    return new RoleRegistry(records.map(r => ({ key: r.identificationKey, name: r.name })));
  }

  /**
   * Build from on-disk roles. The legacy { phrase, name } key form maps
   * the phrase to its own name rather than the file's.
   */
  static fromPersisted(roles: PersistedRole[]): RoleRegistry {
    const entries: KeyEntry[] = [];
    for (const role of roles) {
      const key = role.message_to_role;
      if (!key) continue;
      if (typeof key === 'string') {
        entries.push({ key, name: role.name });
      } else {
        entries.push({ key: key.phrase, name: key.name });
      }
    }
    return new RoleRegistry(entries);
  }

  get size(): number {
    return this.keyToName.size;
  }

  /** Name of the role that produced `message`, or null if none is recognised. */
  resolve(message: string): string | null {
    if (!message) return null;

    const line = firstLine(message);

    const prefixAt = line.indexOf(PERSONA_PREFIX);
    if (prefixAt !== -1) {
      const name = line.slice(prefixAt + PERSONA_PREFIX.length).trim();
      return name || null;
    }

    const window = sliceChars(line, FALLBACK_WINDOW_START, FALLBACK_WINDOW_END);
    if (!window) return null;
    return this.keyToName.get(window) ?? null;
  }

  isSameRole(name: string, message: string): boolean {
    if (!message) return false;
    return message.includes(`${PERSONA_PREFIX}${name}`);
  }
}
