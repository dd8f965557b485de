/**
 * Base Command Class for the Metablock CLI
 *
 * Shared output and error conventions for every command.
 */

import type { Command } from 'commander';
import { Logger } from '@metablock/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();
  protected readonly logger = Logger.createLogger('[CLI] ');

  abstract register(program: Command): void;

  /**
   * Adds the output flags every command accepts.
   */
  protected withOutputOptions(command: Command): Command {
    return command
      .option('--json', 'Output results in JSON format')
      .option('-v, --verbose', 'Show debug output and error details')
      .option('-q, --quiet', 'Only print errors');
  }

  /**
   * Reports a failure and exits. With --json the failure is printed to stdout
   * as `{ success: false, error, exitCode }`.
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      console.error(`❌ ${message}`);
      if (options.verbose && error?.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Reports a success. `data` is printed as `{ success: true, data }` with --json,
   * otherwise only `message` is printed, unless --quiet.
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !options.quiet) {
      console.log(`✅ ${message}`);
    }
  }

  /**
   * Runs `action`, routing any thrown error through handleError.
   */
  protected async run(options: TOptions, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
