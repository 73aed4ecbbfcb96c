/**
 * Configuration management for rolecall
 *
 * Persists the role storage path and preferences to ~/.rolecall/config.json
 */

import * as fs from 'fs';
import * as path from 'path';
import type { RoleStyle } from './types.js';

export interface RolecallConfig {
  roleStoragePath: string;
  defaultStyle?: RoleStyle;
}

const CONFIG_DIR = path.join(process.env.HOME || '~', '.rolecall');
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json');

export const DEFAULT_CONFIG: RolecallConfig = {
  roleStoragePath: path.join(CONFIG_DIR, 'roles'),
  defaultStyle: 'persona',
};

/** Validate that a storage path is usable as a role directory. */
export function validateStoragePath(storagePath: string): { ok: true } | { ok: false; error: string } {
  if (!storagePath.trim()) {
    return { ok: false, error: 'Role storage path must not be empty.' };
  }
  if (!path.isAbsolute(storagePath) && !storagePath.startsWith('~/')) {
    return { ok: false, error: `Role storage path must be absolute (got "${storagePath}").` };
  }
  return { ok: true };
}

export function isRoleStyle(value: unknown): value is RoleStyle {
  return value === 'persona' || value === 'message';
}

/** Expand a leading ~/ to the home directory. */
export function expandHome(p: string): string {
  return p.startsWith('~/')
    ? path.join(process.env.HOME || '', p.slice(2))
    : p;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function loadConfig(configPath: string = CONFIG_PATH): RolecallConfig {
  try {
    if (fs.existsSync(configPath)) {
      const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      const config: RolecallConfig = { ...DEFAULT_CONFIG };
      if (typeof raw === 'object' && raw !== null) {
        if ('roleStoragePath' in raw && typeof raw.roleStoragePath === 'string') {
          config.roleStoragePath = raw.roleStoragePath;
        }
        if ('defaultStyle' in raw && isRoleStyle(raw.defaultStyle)) {
          config.defaultStyle = raw.defaultStyle;
        }
      }
      return config;
    }
  } catch (err) {
    console.debug('Failed to load config:', err);
  }
  return { ...DEFAULT_CONFIG };
}

export function saveConfig(config: RolecallConfig, configPath: string = CONFIG_PATH): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2));
  try {
    fs.chmodSync(configPath, 0o600);
  } catch (err) {
    console.debug('chmod failed:', err);
    process.stderr.write('Warning: could not set restrictive permissions on config file\n');
  }
}

export interface CliFlags {
  storage?: string;
}

/**
 * Resolve config from CLI flags > env vars > config file > defaults
 */
export function resolveConfig(flags: CliFlags, configPath: string = CONFIG_PATH): RolecallConfig {
  const fileConfig = loadConfig(configPath);

  const roleStoragePath =
    flags.storage
    || process.env.ROLECALL_ROLE_STORAGE_PATH
    || fileConfig.roleStoragePath
    || DEFAULT_CONFIG.roleStoragePath;

  const check = validateStoragePath(roleStoragePath);
  if (!check.ok) {
    process.stderr.write(`${check.error}\n`);
  }

  return {
    roleStoragePath: expandHome(roleStoragePath),
    defaultStyle: fileConfig.defaultStyle ?? DEFAULT_CONFIG.defaultStyle,
  };
}
