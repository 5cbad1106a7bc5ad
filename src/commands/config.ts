/**
 * Config Command
 * Show and change sshm's own settings
 */

import { SETTINGS_PATH } from '../constants.js';
import { getSettings, parseSetting, updateSettings } from '../services/config.js';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, success, keyValue, colors, reportError } from '../utils/display.js';

export async function configCommand(options: GlobalOptions & { json?: boolean }): Promise<void> {
  try {
    const { config } = await openContext(options);

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    printBanner();
    keyValue('Settings file', colors.muted(SETTINGS_PATH));
    console.log();
    keyValue('sshDir', config.sshDir);
    keyValue('configFile', config.configFile);
    keyValue('stateFile', config.stateFile);
    keyValue('backupDir', config.backupDir);
    keyValue('defaultKeyType', config.defaultKeyType);
    keyValue('defaultHost', config.defaultHost);
    keyValue('probeTimeoutMs', String(config.probeTimeoutMs));
    keyValue('logLevel', config.logLevel);
  } catch (err) {
    reportError(err);
  }
}

export async function configSetCommand(key: string, value: string): Promise<void> {
  try {
    const update = parseSetting(key, value);
    await updateSettings(update);
    const stored = await getSettings();
    success(`${key} set`);
    console.log(colors.muted(JSON.stringify(stored, null, 2)));
  } catch (err) {
    reportError(err);
  }
}
