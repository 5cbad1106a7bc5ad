/**
 * Tag Command
 * Keep a copy of the default key under a tag
 */

import ora from 'ora';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, success, colors, reportError } from '../utils/display.js';
import type { KeyType } from '../types/index.js';

export async function tagCommand(
  newTag: string,
  options: GlobalOptions & {
    type?: KeyType;
    host?: string;
    force?: boolean;
    switch?: boolean;
  }
): Promise<void> {
  printBanner();

  const spinner = ora(`Tagging the default key as ${newTag}...`).start();

  try {
    const { orchestrator } = await openContext(options);
    const { identity, snapshotId } = await orchestrator.tag({
      newTag,
      keyType: options.type,
      host: options.host,
      force: options.force,
    });
    spinner.succeed('Default key tagged');

    console.log();
    success(`Identity ${identity.tag} added`);
    console.log('  Private:  ' + identity.privatePath);
    console.log('  Alias:    ' + colors.secondary(identity.hostAlias ?? ''));
    console.log('  Backup:   ' + colors.muted(snapshotId));

    if (options.switch) {
      const switched = await orchestrator.switch({ tag: identity.tag, keyType: identity.keyType });
      success(`${colors.secondary(switched.hostPattern)} now uses ${colors.primary(switched.tag)}`);
    }
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail('Failed to tag the default key');
    }
    reportError(err);
  }
}
