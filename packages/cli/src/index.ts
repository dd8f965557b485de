#!/usr/bin/env node

import { Command } from 'commander';
import { InspectCommand } from './commands/inspect/inspect-command';
import { KeygenCommand } from './commands/keygen/keygen-command';
import { MergeCommand } from './commands/merge/merge-command';
import { SignCommand } from './commands/sign/sign-command';
import { VerifyCommand } from './commands/verify/verify-command';
import type { BaseCommandOptions } from './interfaces/command';
import { DependencyInjectionService } from './services/dependency-injection';
import { configureLogging } from './services/logging';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('metablock')
    .description('Sign and verify threshold-signed metadata')
    .version('0.1.0');

  program.hook('preAction', async (_program, actionCommand) => {
    const options: BaseCommandOptions = actionCommand.opts();
    const configManager = await DependencyInjectionService.getInstance().getConfigManager();
    await configureLogging(options, configManager);
  });

  for (const command of [
    new KeygenCommand(),
    new SignCommand(),
    new MergeCommand(),
    new VerifyCommand(),
    new InspectCommand(),
  ]) {
    command.register(program);
  }

  return program;
}

if (require.main === module) {
  createProgram().parseAsync().catch((error: unknown) => {
    console.error("❌ Fatal error:", error);
    process.exit(1);
  });
}
