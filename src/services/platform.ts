/**
 * Platform descriptors
 *
 * Human-readable OS and shell names substituted into the built-in roles.
 */

import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { PlatformDescriptors } from '../types.js';

export interface PlatformProbe {
  platform: NodeJS.Platform;
  release: string;
  env: NodeJS.ProcessEnv;
  /** Contents of /etc/os-release, or null if unreadable. */
  readOsRelease: () => string | null;
  macVersion: () => string;
}

function readOsRelease(): string | null {
  try {
    return fs.readFileSync('/etc/os-release', 'utf-8');
  } catch {
    return null;
  }
}

function macVersion(): string {
  try {
    return execFileSync('sw_vers', ['-productVersion'], { encoding: 'utf-8', timeout: 3_000 }).trim();
  } catch (err) {
    console.debug('sw_vers failed:', err);
    return '';
  }
}

export const SYSTEM_PROBE: PlatformProbe = {
  platform: process.platform,
  release: os.release(),
  env: process.env,
  readOsRelease,
  macVersion,
};

/** PRETTY_NAME from an os-release file, unquoted. */
export function parsePrettyName(osRelease: string): string | null {
  const match = osRelease.match(/^PRETTY_NAME=(.*)$/m);
  if (!match) return null;
  return match[1].trim().replace(/^(["'])(.*)\1$/, '$2');
}

export function osName(probe: PlatformProbe = SYSTEM_PROBE): string {
  switch (probe.platform) {
    case 'linux': {
      const contents = probe.readOsRelease();
      const pretty = contents ? parsePrettyName(contents) : null;
      return `Linux/${pretty ?? 'Linux'}`;
    }
    case 'win32':
      return `Windows ${probe.release}`;
    case 'darwin':
      return `Darwin/MacOS ${probe.macVersion()}`;
    default:
      return probe.platform;
  }
}

export function shellName(probe: PlatformProbe = SYSTEM_PROBE): string {
  if (probe.platform === 'win32') {
    const modulePaths = (probe.env.PSModulePath ?? '').split(path.win32.delimiter);
    return modulePaths.length >= 3 ? 'powershell.exe' : 'cmd.exe';
  }
  return path.basename(probe.env.SHELL || '/bin/sh');
}

export function detectPlatform(probe: PlatformProbe = SYSTEM_PROBE): PlatformDescriptors {
  return { os: osName(probe), shell: shellName(probe) };
}
