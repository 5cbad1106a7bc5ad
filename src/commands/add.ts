/**
 * Add Command
 * Generate a new tagged key pair and its SSH config alias
 */

import ora from 'ora';
import { readPublicKey } from '../services/keygen.js';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, success, colors, reportError } from '../utils/display.js';
import type { KeyType } from '../types/index.js';

export async function addCommand(
  tag: string,
  comment: string | undefined,
  options: GlobalOptions & {
    type?: KeyType;
    host?: string;
    force?: boolean;
  }
): Promise<void> {
  printBanner();

  const spinner = ora(`Generating ${tag} key pair...`).start();

  try {
    const { orchestrator } = await openContext(options);
    const result = await orchestrator.add({
      tag,
      comment,
      keyType: options.type,
      host: options.host,
      force: options.force,
    });
    spinner.succeed('Key pair generated');

    const { identity } = result;
    console.log();
    success(`Identity ${identity.tag} added`);
    console.log();
    console.log('  Key type:  ' + identity.keyType);
    console.log('  Private:   ' + identity.privatePath);
    console.log('  Alias:     ' + colors.secondary(identity.hostAlias ?? ''));
    console.log('  Backup:    ' + colors.muted(result.snapshotId));

    const publicKey = await readPublicKey(identity.publicPath);
    if (publicKey) {
      console.log();
      console.log(colors.muted('Add this public key to your account:'));
      console.log('  ' + publicKey);
    }

    console.log();
    console.log(colors.muted('Next:'));
    console.log('  • Test it:      ' + colors.primary(`sshm test ${identity.tag}`));
    console.log('  • Bind a repo:  ' + colors.primary(`sshm use ${identity.tag}`));
  } catch (err) {
    spinner.fail('Failed to add identity');
    reportError(err);
  }
}
