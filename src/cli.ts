#!/usr/bin/env node

/**
 * sshm CLI
 * Manage several SSH identities on one machine
 */

import { Command, Option } from 'commander';
import { VERSION, BRAND, SUPPORTED_KEY_TYPES } from './constants.js';

// Import commands
import { listCommand } from './commands/list.js';
import { addCommand } from './commands/add.js';
import { removeCommand } from './commands/remove.js';
import { renameCommand } from './commands/rename.js';
import { switchCommand } from './commands/switch.js';
import { tagCommand } from './commands/tag.js';
import { useCommand } from './commands/use.js';
import { infoCommand } from './commands/info.js';
import { testCommand } from './commands/test.js';
import { backupCommand, listBackupsCommand, restoreCommand } from './commands/backup.js';
import { configCommand, configSetCommand } from './commands/config.js';

const program = new Command();

program
  .name('sshm')
  .description(`${BRAND.prefix} ${BRAND.name} - ${BRAND.tagline}`)
  .version(VERSION)
  .option('--ssh-dir <path>', 'SSH directory to manage (default: ~/.ssh)');

const keyTypeOption = () =>
  new Option('-t, --type <type>', 'Key type').choices([...SUPPORTED_KEY_TYPES]);

// Global options are merged into each command's own
const withGlobals = <T extends object>(options: T) => ({ ...program.opts<{ sshDir?: string }>(), ...options });

// ============================================================================
// IDENTITY COMMANDS
// ============================================================================

program
  .command('list')
  .alias('ls')
  .description('List identities and any inconsistencies')
  .option('--json', 'Output as JSON')
  .option('-k, --show-key', 'Print each public key')
  .action(async (options) => {
    await listCommand(withGlobals(options));
  });

program
  .command('add <tag> [comment]')
  .description('Generate a key pair for a new identity')
  .addOption(keyTypeOption())
  .option('-H, --host <host>', 'Platform host (inferred from the tag by default)')
  .option('-f, --force', 'Replace an existing key pair or alias')
  .action(async (tag, comment, options) => {
    await addCommand(tag, comment, withGlobals(options));
  });

program
  .command('remove <tag>')
  .alias('rm')
  .description('Delete an identity\'s keys and aliases')
  .addOption(keyTypeOption())
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (tag, options) => {
    await removeCommand(tag, withGlobals(options));
  });

program
  .command('rename <old> <new>')
  .description('Rename an identity')
  .action(async (oldTag, newTag) => {
    await renameCommand(oldTag, newTag, withGlobals({}));
  });

program
  .command('switch <tag>')
  .description('Use an identity for every connection to a host')
  .addOption(keyTypeOption())
  .option('-H, --host <pattern>', 'Host pattern (default: the identity\'s host)')
  .action(async (tag, options) => {
    await switchCommand(tag, withGlobals(options));
  });

program
  .command('tag <new-tag>')
  .description('Copy the default key under a tag')
  .addOption(keyTypeOption())
  .option('-H, --host <host>', 'Platform host (inferred from the tag by default)')
  .option('-f, --force', 'Replace an existing key pair')
  .option('-s, --switch', 'Switch to the new identity afterwards')
  .action(async (newTag, options) => {
    await tagCommand(newTag, withGlobals(options));
  });

// ============================================================================
// REPOSITORY COMMANDS
// ============================================================================

program
  .command('use <tag>')
  .description('Point a repository\'s remote at an identity')
  .option('-p, --path <path>', 'Repository path (default: current directory)')
  .option('-r, --remote <name>', 'Remote name (default: origin)')
  .option('-y, --yes', 'Replace a conflicting alias without asking')
  .option('--no-verify', 'Skip the connection test')
  .action(async (tag, options) => {
    await useCommand(tag, withGlobals(options));
  });

program
  .command('info')
  .description('Show which identity a repository uses')
  .option('-p, --path <path>', 'Repository path (default: current directory)')
  .option('-r, --remote <name>', 'Remote name (default: origin)')
  .action(async (options) => {
    await infoCommand(withGlobals(options));
  });

program
  .command('test [tag]')
  .description('Test authentication for an identity, or for the current repository')
  .option('-a, --all', 'Test every identity')
  .option('-p, --path <path>', 'Repository path when no tag is given')
  .action(async (tag, options) => {
    await testCommand(tag, withGlobals(options));
  });

// ============================================================================
// BACKUP COMMANDS
// ============================================================================

program
  .command('backup')
  .description('Snapshot the keys, SSH config and state')
  .action(async () => {
    await backupCommand(withGlobals({}));
  });

program
  .command('backups')
  .description('List snapshots, newest first')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    await listBackupsCommand(withGlobals(options));
  });

program
  .command('restore <id>')
  .description('Restore a snapshot (the current files are snapshotted first)')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (id, options) => {
    await restoreCommand(id, withGlobals(options));
  });

// ============================================================================
// SETTINGS
// ============================================================================

const config = program
  .command('config')
  .description('Show the effective settings')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    await configCommand(withGlobals(options));
  });

config
  .command('set <key> <value>')
  .description('Store a setting in ~/.sshm/config.json')
  .action(async (key, value) => {
    await configSetCommand(key, value);
  });

// ============================================================================
// RUN
// ============================================================================

await program.parseAsync();
