import { Command } from 'commander';
import { HeadersCommand } from './headers-command';

/**
 * Register the headers command
 */
export function registerHeadersCommand(program: Command): void {
  const headersCommand = new HeadersCommand();
  headersCommand.register(program);
}
