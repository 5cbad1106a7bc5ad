/**
 * Backup Commands
 * Take, list and restore snapshots of the SSH directory
 */

import ora from 'ora';
import { openContext, type GlobalOptions } from './context.js';
import {
  printBanner,
  success,
  info,
  dim,
  colors,
  formatDate,
  reportError,
} from '../utils/display.js';
import { confirm } from '../utils/prompts.js';

export async function backupCommand(options: GlobalOptions): Promise<void> {
  printBanner();

  const spinner = ora('Taking snapshot...').start();

  try {
    const { orchestrator } = await openContext(options);
    const id = await orchestrator.backup();
    spinner.succeed('Snapshot taken');
    console.log();
    success(`Backup ${colors.primary(id)}`);
  } catch (err) {
    spinner.fail('Failed to take snapshot');
    reportError(err);
  }
}

export async function listBackupsCommand(options: GlobalOptions & { json?: boolean }): Promise<void> {
  try {
    const { orchestrator } = await openContext(options);
    const backups = await orchestrator.listBackups();

    if (options.json) {
      console.log(JSON.stringify(backups, null, 2));
      return;
    }

    printBanner();

    if (backups.length === 0) {
      dim('No backups yet.');
      return;
    }

    for (const backup of backups) {
      console.log(
        colors.primary(backup.id) + '  ' +
        colors.muted(`${formatDate(backup.createdAt)} · ${backup.fileCount} file(s)`)
      );
    }
  } catch (err) {
    reportError(err);
  }
}

export async function restoreCommand(id: string, options: GlobalOptions & { yes?: boolean }): Promise<void> {
  printBanner();

  try {
    const { orchestrator } = await openContext(options);

    const confirmed = options.yes || await confirm(
      `Restore ${colors.primary(id)}? Current files it contains will be overwritten.`,
      false
    );
    if (!confirmed) {
      info('Cancelled.');
      return;
    }

    const spinner = ora('Restoring...').start();
    try {
      const result = await orchestrator.restore(id);
      spinner.succeed(`Restored ${result.restored.length} file(s)`);
      console.log();
      for (const file of result.restored) {
        console.log(colors.muted(`  • ${file.source}`));
      }
      console.log();
      console.log(colors.muted(`The previous state was saved as ${result.snapshotId}`));
    } catch (err) {
      spinner.fail('Restore failed');
      throw err;
    }
  } catch (err) {
    reportError(err);
  }
}
