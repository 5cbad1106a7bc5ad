/**
 * Use Command
 * Point the current repository's remote at an identity's SSH alias
 */

import ora from 'ora';
import { ConflictError } from '../errors.js';
import type { UseOptions, UseResult } from '../services/orchestrator.js';
import { openContext, type GlobalOptions } from './context.js';
import {
  printBanner,
  success,
  warning,
  info,
  colors,
  formatProbe,
  reportError,
} from '../utils/display.js';
import { confirm } from '../utils/prompts.js';

export async function useCommand(
  tag: string,
  options: GlobalOptions & {
    path?: string;
    remote?: string;
    yes?: boolean;
    verify?: boolean;
  }
): Promise<void> {
  printBanner();

  const spinner = ora(`Binding repository to ${tag}...`);

  try {
    const { orchestrator } = await openContext(options);
    const request: UseOptions = {
      tag,
      repoPath: options.path,
      remote: options.remote,
      force: options.yes,
      verify: options.verify,
    };

    spinner.start();
    let result: UseResult;
    try {
      result = await orchestrator.use(request);
    } catch (err) {
      // An alias owned by another key is only replaced after confirmation
      if (!(err instanceof ConflictError) || err.step !== 'validate' || options.yes) {
        throw err;
      }
      spinner.stop();
      warning(err.message);
      if (!(await confirm(`Replace Host ${err.subject}?`, false))) {
        info('Cancelled.');
        return;
      }
      spinner.start();
      result = await orchestrator.use({ ...request, force: true });
    }

    if (result.binding.status === 'verified') {
      spinner.succeed('Repository bound and verified');
    } else if (result.probe) {
      spinner.warn('Repository bound, but the connection test failed');
    } else {
      spinner.succeed('Repository bound');
    }

    console.log();
    if (result.changed) {
      success('Remote updated');
      console.log('  From:  ' + colors.muted(result.previousUrl));
      console.log('  To:    ' + colors.secondary(result.remoteUrl));
    } else {
      success(`Remote already uses ${result.alias}`);
    }
    if (result.snapshotId) {
      console.log('  Backup: ' + colors.muted(result.snapshotId));
    }

    if (result.probe) {
      console.log();
      console.log('  Test:  ' + formatProbe(result.probe));
      if (result.probe.outcome !== 'success' && result.probe.diagnostic) {
        console.log(colors.muted(result.probe.diagnostic.split('\n').map(l => `  │ ${l}`).join('\n')));
      }
    }
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail('Failed to bind repository');
    }
    reportError(err);
  }
}
