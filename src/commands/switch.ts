/**
 * Switch Command
 * Make a tagged identity the one used for a host
 */

import ora from 'ora';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, success, colors, reportError } from '../utils/display.js';
import type { KeyType } from '../types/index.js';

export async function switchCommand(tag: string, options: GlobalOptions & { host?: string; type?: KeyType }): Promise<void> {
  printBanner();

  const spinner = ora(`Switching to ${tag}...`).start();

  try {
    const { orchestrator } = await openContext(options);
    const result = await orchestrator.switch({ tag, host: options.host, keyType: options.type });
    spinner.succeed('Switched');

    console.log();
    success(`${colors.secondary(result.hostPattern)} now uses ${colors.primary(result.tag)}`);
    console.log(colors.muted(`Backup: ${result.snapshotId}`));
  } catch (err) {
    spinner.fail('Failed to switch identity');
    reportError(err);
  }
}
