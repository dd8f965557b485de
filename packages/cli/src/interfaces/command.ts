/**
 * Standard Command Interface for the Metablock CLI
 */

import type { Command } from 'commander';

/**
 * Options every command accepts
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Options of commands that read or write signed documents
 */
export interface DocumentCommandOptions extends BaseCommandOptions {
  type: string;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  register(program: Command): void;
}
