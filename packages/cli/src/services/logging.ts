import { Logger } from '@metablock/core';
import type { Config } from '@metablock/core';
import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Sets the level for every core logger. Flags win, then METABLOCK_LOG_LEVEL,
 * then the configured logLevel.
 */
export async function configureLogging(
  options: BaseCommandOptions,
  configManager: Pick<Config.IConfigManager, 'getLogLevel'>
): Promise<void> {
  if (options.verbose) {
    Logger.setDefaultLogLevel('debug');
  } else if (options.quiet) {
    Logger.setDefaultLogLevel('error');
  } else if (Logger.isLogLevel(process.env['METABLOCK_LOG_LEVEL'])) {
    Logger.setDefaultLogLevel(null);
  } else {
    Logger.setDefaultLogLevel(await configManager.getLogLevel());
  }
}
