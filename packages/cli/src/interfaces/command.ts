/**
 * Standard Command Interface for the dcoguard CLI
 *
 * All commands implement this interface so they can be registered with
 * Commander and executed directly from tests.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  /**
   * Execute the command with given options.
   * Ends the process through process.exit with the command's exit code.
   */
  execute(options: TOptions): Promise<void>;
}

/**
 * Complete command interface combining all capabilities
 */
export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }
