import { Command } from 'commander';
import { SignoffCommand } from './signoff-command';

/**
 * Register the signoff command
 */
export function registerSignoffCommand(program: Command): void {
  const signoffCommand = new SignoffCommand();
  signoffCommand.register(program);
}
