/**
 * Info Command
 * Show which identity a repository's remote routes through
 */

import { openContext, type GlobalOptions } from './context.js';
import { printBanner, keyValue, colors, dim, reportError } from '../utils/display.js';

export async function infoCommand(options: GlobalOptions & { path?: string; remote?: string }): Promise<void> {
  printBanner();

  try {
    const { orchestrator } = await openContext(options);
    const info = await orchestrator.info(options.path, options.remote);

    keyValue('Remote', info.binding.remoteUrl ?? '');
    keyValue('Host', info.remote.host);
    keyValue('Repository', `${info.remote.owner}/${info.remote.repo}`);

    if (info.binding.status === 'unbound') {
      console.log();
      dim('No sshm alias routes this remote; ssh picks the default key.');
      console.log('Bind it with: ' + colors.primary('sshm use <tag>'));
      return;
    }

    keyValue('Alias', colors.secondary(info.binding.alias));
    keyValue('Identity', info.identity ? colors.primary(info.identity.tag) : colors.warning('unknown key'));
    if (info.block?.hostname) keyValue('HostName', info.block.hostname);
    if (info.block?.identityFile) keyValue('IdentityFile', info.block.identityFile);
  } catch (err) {
    reportError(err);
  }
}
