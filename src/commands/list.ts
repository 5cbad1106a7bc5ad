/**
 * List Command
 * List every identity and the problems found between disk, state and config
 */

import { readPublicKey } from '../services/keygen.js';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, colors, dim, formatIdentity, formatIssue, reportError } from '../utils/display.js';

export async function listCommand(options: GlobalOptions & {
  json?: boolean;
  showKey?: boolean;
}): Promise<void> {
  try {
    const { config, orchestrator } = await openContext(options);
    const view = await orchestrator.list();

    if (options.json) {
      console.log(JSON.stringify(view, null, 2));
      return;
    }

    printBanner();

    if (view.identities.length === 0) {
      dim(`No identities found in ${config.sshDir}.`);
      console.log();
      console.log('Create your first one: ' + colors.primary('sshm add <tag>'));
    }

    for (const identity of view.identities) {
      console.log(formatIdentity(identity));

      const details: string[] = [`host ${identity.hostname}`];
      if (identity.activeFor.length > 0) {
        details.push(`active for ${identity.activeFor.join(', ')}`);
      }
      if (identity.metadata?.comment) {
        details.push(identity.metadata.comment);
      }
      console.log(colors.muted(`  └─ ${details.join(' · ')}`));

      if (options.showKey) {
        for (const key of identity.keys) {
          const publicKey = await readPublicKey(key.publicPath);
          if (publicKey) {
            console.log(`     ${publicKey}`);
          }
        }
      }
    }

    if (view.issues.length > 0) {
      console.log();
      console.log(colors.warning(`${view.issues.length} issue(s):`));
      for (const issue of view.issues) {
        console.log('  ' + formatIssue(issue));
      }
    }

    console.log();
    console.log(colors.muted('Commands:'));
    console.log('  Add identity:   ' + colors.primary('sshm add <tag>'));
    console.log('  Bind a repo:    ' + colors.primary('sshm use <tag>'));
    console.log('  Test identity:  ' + colors.primary('sshm test <tag>'));
  } catch (err) {
    reportError(err);
  }
}
