#!/usr/bin/env node

/**
 * rolecall CLI
 *
 * Entry point for the rolecall command
 */

import * as fs from 'fs';
import { Command } from 'commander';
import { openRoleManager, parseVariableAssignments } from './app.js';
import { getConfigPath, isRoleStyle, loadConfig, saveConfig, validateStoragePath } from './config.js';
import { UNKNOWN_ROLE } from './constants.js';
import { isRoleError } from './errors.js';
import type { RoleManager } from './services/roles.js';
import { toRoleChoice } from './tui/helpers.js';
import { confirmWithInk, pickRole, promptDescription } from './tui/prompts.js';
import type { TemplateVariables } from './types.js';

const program = new Command();

program
  .name('rolecall')
  .description('Manage and identify assistant role templates')
  .version('0.1.0')
  .option('-s, --storage <path>', 'Role storage directory');

function openRoles(): RoleManager {
  const { storage } = program.opts<{ storage?: string }>();
  return openRoleManager({ storage, confirm: confirmWithInk });
}

/** Run a command body, reporting role errors as a one-line message. */
async function run(body: () => Promise<void> | void): Promise<void> {
  try {
    await body();
  } catch (err) {
    if (isRoleError(err)) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

program
  .command('create')
  .description('Create a role (prompts for the description when omitted)')
  .argument('<name>', 'Role name')
  .option('-d, --description <text>', 'Role description')
  .option('--message', 'Store the description as-is, without the "You are <name>" header')
  .option('--var <key=value...>', 'Template variables to substitute into the description')
  .action((name: string, opts: { description?: string; message?: boolean; var?: string[] }) => run(async () => {
    let variables: TemplateVariables | undefined;
    if (opts.var) {
      const parsed = parseVariableAssignments(opts.var);
      if (!parsed.ok) {
        console.error(parsed.error);
        process.exit(1);
      }
      variables = parsed.variables;
    }

    const description = opts.description ?? await promptDescription(name);
    if (description === null) {
      console.log('Cancelled.');
      return;
    }

    const roles = openRoles();
    const outcome = await roles.create(name, description, {
      style: opts.message ? 'message' : undefined,
      variables,
    });
    console.log(outcome.status === 'done' ? `Role "${name}" saved.` : 'Cancelled.');
  }));

program
  .command('show')
  .description('Print the stored instruction text of a role')
  .argument('<name>', 'Role name')
  .action((name: string) => run(() => {
    console.log(openRoles().show(name));
  }));

program
  .command('list')
  .description('List role files, oldest first')
  .action(() => run(() => {
    for (const filePath of openRoles().list()) {
      console.log(filePath);
    }
  }));

program
  .command('delete')
  .description('Delete a role')
  .argument('<name>', 'Role name')
  .action((name: string) => run(async () => {
    const outcome = await openRoles().delete(name);
    console.log(outcome.status === 'done' ? `Role "${name}" deleted.` : 'Cancelled.');
  }));

program
  .command('resolve')
  .description('Identify the role that produced a rendered instruction (reads stdin when no message is given)')
  .argument('[message]', 'Rendered instruction text')
  .action((message: string | undefined) => run(() => {
    const text = message ?? fs.readFileSync(0, 'utf-8');
    console.log(openRoles().resolve(text) ?? UNKNOWN_ROLE);
  }));

program
  .command('default')
  .description('Print the built-in role selected by flags (shell > describe-shell > code > default)')
  .option('--shell', 'Shell command generator')
  .option('--describe-shell', 'Shell command descriptor')
  .option('--code', 'Code generator')
  .action((opts: { shell?: boolean; describeShell?: boolean; code?: boolean }) => run(() => {
    console.log(openRoles().getDefault(opts).renderedBody);
  }));

program
  .command('pick')
  .description('Choose a stored role interactively and print it')
  .action(() => run(async () => {
    const roles = openRoles();
    const choices = roles.records().map(toRoleChoice);

    const choice = await pickRole(choices);
    if (choice) console.log(roles.show(choice.name));
  }));

program
  .command('config')
  .description('View or update rolecall configuration')
  .option('--role-storage <path>', 'Set role storage directory')
  .option('--style <style>', 'Set default style for new roles (persona or message)')
  .action((opts: { roleStorage?: string; style?: string }) => {
    const config = loadConfig();
    let updated = false;

    if (opts.roleStorage) {
      const check = validateStoragePath(opts.roleStorage);
      if (!check.ok) {
        console.error(check.error);
        process.exit(1);
      }
      config.roleStoragePath = opts.roleStorage;
      updated = true;
    }

    if (opts.style) {
      if (!isRoleStyle(opts.style)) {
        console.error('Invalid style. Must be "persona" or "message".');
        process.exit(1);
      }
      config.defaultStyle = opts.style;
      updated = true;
    }

    if (updated) {
      saveConfig(config);
      console.log('Configuration saved.\n');
    }

    console.log(`Config file: ${getConfigPath()}\n`);
    console.log(`  Role storage:  ${config.roleStoragePath}`);
    console.log(`  Default style: ${config.defaultStyle ?? 'persona'}`);
    console.log('');
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
