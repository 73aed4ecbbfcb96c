/**
 * Tests for configuration loading and precedence
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  expandHome,
  loadConfig,
  resolveConfig,
  saveConfig,
  validateStoragePath,
} from '../config';

describe('config', () => {
  let tmpDir: string;
  let configPath: string;
  const savedEnv = process.env.ROLECALL_ROLE_STORAGE_PATH;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rolecall-config-'));
    configPath = path.join(tmpDir, 'conf', 'config.json');
    delete process.env.ROLECALL_ROLE_STORAGE_PATH;
    jest.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (savedEnv === undefined) {
      delete process.env.ROLECALL_ROLE_STORAGE_PATH;
    } else {
      process.env.ROLECALL_ROLE_STORAGE_PATH = savedEnv;
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('round-trips through saveConfig', () => {
    saveConfig({ roleStoragePath: '/srv/roles', defaultStyle: 'message' }, configPath);
    expect(loadConfig(configPath)).toEqual({ roleStoragePath: '/srv/roles', defaultStyle: 'message' });
  });

  it('ignores fields with the wrong type', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify({ roleStoragePath: 42, defaultStyle: 'loud' }));
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults on unreadable JSON', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '{oops');
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  describe('resolveConfig', () => {
    beforeEach(() => {
      saveConfig({ roleStoragePath: '/from/file', defaultStyle: 'message' }, configPath);
    });

    it('prefers the CLI flag', () => {
      process.env.ROLECALL_ROLE_STORAGE_PATH = '/from/env';
      expect(resolveConfig({ storage: '/from/flag' }, configPath).roleStoragePath).toBe('/from/flag');
    });

    it('then the environment', () => {
      process.env.ROLECALL_ROLE_STORAGE_PATH = '/from/env';
      expect(resolveConfig({}, configPath).roleStoragePath).toBe('/from/env');
    });

    it('then the config file', () => {
      expect(resolveConfig({}, configPath)).toEqual({ roleStoragePath: '/from/file', defaultStyle: 'message' });
    });

    it('warns about a relative storage path', () => {
      const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      resolveConfig({ storage: 'roles' }, configPath);
      expect(write).toHaveBeenCalledWith('Role storage path must be absolute (got "roles").\n');
    });
  });

  it('validates storage paths', () => {
    expect(validateStoragePath('/abs/roles')).toEqual({ ok: true });
    expect(validateStoragePath('~/roles')).toEqual({ ok: true });
    expect(validateStoragePath(' ')).toEqual({ ok: false, error: 'Role storage path must not be empty.' });
  });

  it('expands a leading ~/', () => {
    expect(expandHome('~/roles')).toBe(path.join(process.env.HOME || '', 'roles'));
    expect(expandHome('/abs')).toBe('/abs');
  });
});
