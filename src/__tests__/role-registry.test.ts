/**
 * Tests for RoleRegistry
 *
 * Resolution precedence: the "You are <name>" header first, then the
 * fixed [8, 27) window of the first line against stored keys.
 */

import { RoleRegistry } from '../services/role-registry';
import type { RoleRecord } from '../types';

function record(name: string, identificationKey: string): RoleRecord {
  return { name, rawDescription: '', renderedBody: '', identificationKey };
}

describe('RoleRegistry.resolve', () => {
  const registry = RoleRegistry.fromRecords([
    record('Code Generator', 'Provide only code as'),
    record('Translator', 'Translate everything'),
  ]);

  it('identifies nothing in an empty message', () => {
    expect(registry.resolve('')).toBeNull();
  });

  it('reads the role name from a "You are" header', () => {
    expect(registry.resolve('You are ShellGPT\nYou are programming and system administration assistant.')).toBe('ShellGPT');
  });

  it('reads the header behind a speaker tag and trims it', () => {
    expect(registry.resolve('system: You are Code Reviewer  \nReview the diff.')).toBe('Code Reviewer');
  });

  it('prefers the header over a matching key', () => {
    const shadowed = RoleRegistry.fromRecords([record('Keyed', 'You are Header')]);
    expect(shadowed.resolve('system: You are Header')).toBe('Header');
  });

  it('falls back to the key window after an 8-character speaker tag', () => {
    expect(registry.resolve('system: Provide only code as output without any description.\nMore text')).toBe('Code Generator');
    expect(registry.resolve('system: Translate everything into French')).toBe('Translator');
  });

  it('does not match a key outside the fixed window', () => {
    expect(registry.resolve('Provide only code as output without any description.')).toBeNull();
    expect(registry.resolve('sys: Provide only code as output')).toBeNull();
  });

  it('inspects the first line only', () => {
    expect(registry.resolve('hello\nYou are Hidden')).toBeNull();
    expect(registry.resolve('You are Alpha\rYou are Beta')).toBe('Alpha');
    expect(registry.resolve('You are Alpha\r\nsecond line')).toBe('Alpha');
  });

  it('identifies nothing for an unknown first line', () => {
    expect(registry.resolve('user: what is the weather like today?')).toBeNull();
  });

  it('identifies nothing for a header with no name', () => {
    expect(registry.resolve('system: You are ')).toBeNull();
  });
});

describe('RoleRegistry construction', () => {
  it('lets later records shadow earlier ones with the same key', () => {
    const registry = RoleRegistry.fromRecords([
      record('First', 'Provide only code as'),
      record('Second', 'Provide only code as'),
    ]);
    expect(registry.size).toBe(1);
    expect(registry.resolve('system: Provide only code as output')).toBe('Second');
  });

  it('skips records without a key', () => {
    expect(RoleRegistry.fromRecords([record('Empty', '')]).size).toBe(0);
  });

  it('maps legacy phrase/name keys to their own name', () => {
    const registry = RoleRegistry.fromPersisted([
      {
        name: 'translator',
        role: 'あなたの任務は、日本語から英語に翻訳することです',
        message_to_role: { phrase: 'あなたの任務は、日本語から英語', name: 'jp-to-en' },
      },
      { name: 'plain', role: 'Provide only code as output', message_to_role: 'Provide only code as' },
      { name: 'bare', role: 'No key stored' },
    ]);

    expect(registry.size).toBe(2);
    expect(registry.resolve('system: あなたの任務は、日本語から英語\n続き')).toBe('jp-to-en');
    expect(registry.resolve('system: Provide only code as output')).toBe('plain');
  });
});

describe('RoleRegistry.isSameRole', () => {
  const registry = new RoleRegistry([]);

  it('matches a message rendered for the named role', () => {
    expect(registry.isSameRole('ShellGPT', 'system: You are ShellGPT\n...')).toBe(true);
  });

  it('rejects other roles and empty messages', () => {
    expect(registry.isSameRole('ShellGPT', 'You are Poet\n...')).toBe(false);
    expect(registry.isSameRole('ShellGPT', '')).toBe(false);
  });
});
