/**
 * Remove Command
 * Delete an identity's key files and the aliases routing to them
 */

import ora from 'ora';
import { DEFAULT_TAG } from '../constants.js';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, success, info, warning, colors, reportError } from '../utils/display.js';
import { confirm, select } from '../utils/prompts.js';
import type { KeyType } from '../types/index.js';

export async function removeCommand(
  tag: string,
  options: GlobalOptions & {
    type?: KeyType;
    yes?: boolean;
  }
): Promise<void> {
  printBanner();

  try {
    const { orchestrator } = await openContext(options);
    const normalized = tag.trim().toLowerCase();
    let keyType = options.type;

    if (normalized === DEFAULT_TAG) {
      const identity = await orchestrator.list().then(v => v.identities.find(i => i.tag === DEFAULT_TAG));
      if (identity && !keyType && identity.keys.length > 1) {
        keyType = await select(
          'The default identity holds several key types. Which one should be removed?',
          identity.keys.map(k => ({ name: k.keyType, value: k.keyType }))
        );
      }
      warning('This removes the unlabeled key every SSH connection falls back to.');
    }

    const confirmed = options.yes || await confirm(
      `Remove identity ${colors.primary(normalized)}${keyType ? ` (${keyType})` : ''}?`,
      false
    );

    if (!confirmed) {
      console.log();
      info('Cancelled.');
      return;
    }

    const spinner = ora('Removing identity...').start();
    try {
      const result = await orchestrator.remove({ tag: normalized, keyType, confirmed });
      spinner.succeed('Identity removed');

      console.log();
      success(`Removed ${result.removedFiles.length} file(s)`);
      for (const file of result.removedFiles) {
        console.log(colors.muted(`  • ${file}`));
      }
      for (const alias of result.removedAliases) {
        console.log(colors.muted(`  • Host ${alias}`));
      }
      console.log(colors.muted(`Backup: ${result.snapshotId}`));
    } catch (err) {
      spinner.fail('Failed to remove identity');
      throw err;
    }
  } catch (err) {
    reportError(err);
  }
}
