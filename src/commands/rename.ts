/**
 * Rename Command
 */

import ora from 'ora';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, success, colors, reportError } from '../utils/display.js';

export async function renameCommand(oldTag: string, newTag: string, options: GlobalOptions): Promise<void> {
  printBanner();

  const spinner = ora(`Renaming ${oldTag} to ${newTag}...`).start();

  try {
    const { orchestrator } = await openContext(options);
    const result = await orchestrator.rename(oldTag, newTag);
    spinner.succeed('Identity renamed');

    console.log();
    success(`${oldTag} is now ${newTag}`);
    console.log('  Alias:   ' + colors.muted(result.oldAlias) + ' → ' + colors.secondary(result.newAlias));
    console.log('  Files:   ' + result.renamedFiles.join(', '));
    console.log('  Backup:  ' + colors.muted(result.snapshotId));
    console.log();
    console.log(colors.muted(`Repositories using ${result.oldAlias} need \`sshm use ${newTag}\`.`));
  } catch (err) {
    spinner.fail('Failed to rename identity');
    reportError(err);
  }
}
